import { MiddlewareConsumer, Module, NestModule } from "@nestjs/common";
import { ThrottlerModule, ThrottlerGuard } from "@nestjs/throttler";
import { APP_GUARD } from "@nestjs/core";
import { ConfigModule } from "./modules/config/config.module";
import { ClockModule } from "./modules/clock";
import { UnitOfWorkModule } from "./modules/unit-of-work";
import { TokenModule } from "./modules/token";
import { ClaimLedgerModule } from "./modules/claim-ledger";
import { CallbackModule } from "./modules/callback";
import { FeesModule } from "./modules/fees";
import { LoanOfferModule } from "./modules/loan-offer";
import { LoanModule } from "./modules/loan";
import { BatchModule } from "./modules/batch";
import { HealthModule } from "./modules/health";
import { RequestLoggerMiddleware } from "./common/middleware/request-logger.middleware";

@Module({
  imports: [
    ConfigModule,
    ThrottlerModule.forRoot([
      {
        name: "default",
        ttl: 60_000,
        limit: 60,
      },
    ]),
    ClockModule,
    UnitOfWorkModule,
    TokenModule,
    ClaimLedgerModule,
    CallbackModule,
    FeesModule,
    LoanOfferModule,
    LoanModule,
    BatchModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestLoggerMiddleware).forRoutes("*");
  }
}
