import { Global, Module } from "@nestjs/common";
import { CallbackRegistry } from "./callback-registry.service";

@Global()
@Module({
  providers: [CallbackRegistry],
  exports: [CallbackRegistry],
})
export class CallbackModule {}
