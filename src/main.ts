import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger, ValidationPipe } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { AppModule } from "./app.module";
import { AllExceptionsFilter } from "./common/filters/all-exceptions.filter";
import { CALLER_HEADER } from "./common/decorators/caller-address.decorator";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);
  const port = config.get<number>("PORT", 3000);

  // ─── Global pipes ───
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // ─── Global filters ───
  app.useGlobalFilters(new AllExceptionsFilter());

  // ─── CORS: env-configured allowlist, restrictive by default ───
  const allowedOrigins = config
    .get<string>("CORS_ORIGINS", "")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  app.enableCors({
    origin: (origin, callback) => {
      // Origin-less requests (server-to-server) only outside production.
      if (!origin) {
        const isProd = config.get<string>("NODE_ENV") === "production";
        return callback(isProd ? new Error("Origin required") : null, !isProd);
      }
      if (allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      return callback(new Error(`CORS: origin ${origin} not allowed`), false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "x-api-key", CALLER_HEADER, "x-request-id"],
    credentials: false,
  });

  await app.listen(port);
  Logger.log(`peer-lending-service listening on http://localhost:${port}`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    `Bootstrap failed: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err.stack : undefined,
    "Bootstrap",
  );
  process.exit(1);
});
