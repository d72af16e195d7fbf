import {
  IsEnum,
  IsEthereumAddress,
  IsInt,
  IsNumber,
  IsString,
  Matches,
  Max,
  Min,
  MinLength,
  validateSync,
} from "class-validator";
import { plainToInstance, Transform } from "class-transformer";

export enum Environment {
  Development = "development",
  Staging = "staging",
  Production = "production",
  Test = "test",
}

export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @Transform(({ value }) => parseInt(value, 10))
  @IsNumber()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  /**
   * Admin API key. Protects /admin/* routes.
   * Required at startup; no fail-open fallback.
   */
  @IsString()
  @MinLength(16)
  ADMIN_API_KEY!: string;

  /** Address allowed to set fees and withdraw them. */
  @IsEthereumAddress()
  ADMIN_ADDRESS!: string;

  /**
   * Address this service acts as: claim controller, token spender and
   * custodian of accrued protocol fees.
   */
  @IsEthereumAddress()
  ENGINE_ADDRESS!: string;

  /** Initial protocol fee on interest, in bps out of 10000. */
  @Transform(({ value }) => parseInt(value, 10))
  @IsInt()
  @Min(0)
  @Max(10000)
  PROTOCOL_FEE_BPS: number = 0;

  /** Fixed native fee (wei, decimal string) attached to every loan offer. */
  @IsString()
  @Matches(/^\d+$/)
  LOAN_OFFER_FEE: string = "0";

  /**
   * Comma-separated list of allowed CORS origins.
   * Example: https://app.example.org,https://admin.example.org
   */
  @IsString()
  @MinLength(1)
  CORS_ORIGINS!: string;
}

export function validate(config: Record<string, unknown>) {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, {
    skipMissingProperties: false,
  });
  if (errors.length > 0) {
    throw new Error(
      `Environment validation failed:\n${errors
        .map((e) => Object.values(e.constraints ?? {}).join(", "))
        .join("\n")}`,
    );
  }
  return validated;
}
