import { Controller, Get } from "@nestjs/common";
import { Clock } from "../clock";
import { ProtocolConfig } from "../config";

@Controller("health")
export class HealthController {
  constructor(
    private readonly clock: Clock,
    private readonly protocol: ProtocolConfig,
  ) {}

  @Get()
  check() {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      clock: this.clock.now(),
      engine: this.protocol.engineAddress,
    };
  }
}
