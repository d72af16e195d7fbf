import { Global, Module } from "@nestjs/common";
import { ConfigModule as NestConfigModule } from "@nestjs/config";
import { validate } from "./env.validation";
import { ProtocolConfig } from "./protocol.config";

// Not re-exported from ./index: forRoot() validates process.env as soon as
// this file is loaded.
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      validate,
    }),
  ],
  providers: [ProtocolConfig],
  exports: [ProtocolConfig],
})
export class ConfigModule {}
