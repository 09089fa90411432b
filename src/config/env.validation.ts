import { plainToInstance } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';

// Environment variables read at startup. Defaults apply when a variable is unset.
export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  @IsNotEmpty()
  FINNHUB_API_TOKEN!: string;

  @IsUrl({ require_tld: false })
  FINNHUB_BASE_URL: string = 'https://finnhub.io/api/v1';

  @IsInt()
  @Min(1)
  QUOTE_REQUEST_TIMEOUT_MS: number = 10000;

  @IsString()
  @IsNotEmpty()
  PORTFOLIO_STATE_FILE: string = 'data/portfolio.json';

  // 0 disables the periodic refresh
  @IsInt()
  @Min(0)
  REFRESH_INTERVAL_MS: number = 60000;

  @IsOptional()
  @IsString()
  NODE_ENV?: string;
}

/**
 * Validates process environment for ConfigModule.forRoot.
 * @throws Error listing every invalid variable
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.map((error) => {
      const constraints = Object.values(error.constraints ?? {});
      return `${error.property}: ${constraints.join(', ')}`;
    });
    throw new Error(`Invalid environment configuration - ${messages.join('; ')}`);
  }

  return validated;
}
