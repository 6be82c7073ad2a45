import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type AppLogLevel = (typeof LOG_LEVELS)[number];

// Reads the raw env string; implicit conversion would turn "false" into true
function toBoolean({ obj, key, value }: TransformFnParams): unknown {
  const raw: unknown = obj[key];
  if (typeof raw !== 'string') return value;
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  return raw;
}

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: string = 'development';

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL: AppLogLevel = 'log';

  @IsOptional()
  @IsString()
  ALPHA_VANTAGE_API_KEY: string = 'demo';

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  YAHOO_FINANCE_ENABLED: boolean = true;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  COINGECKO_ENABLED: boolean = true;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(86_400)
  CACHE_TTL_SECONDS: number = 300;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(86_400)
  PRICE_CACHE_TTL_SECONDS: number = 300;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(86_400)
  SIGNAL_CACHE_TTL_SECONDS: number = 600;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(604_800)
  ASSET_METADATA_TTL_SECONDS: number = 86_400;

  @IsOptional()
  @IsString()
  CACHE_KEY_PREFIX: string = 'marketsignals:';

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(60_000)
  RATE_LIMIT_MIN_INTERVAL_MS: number = 1000;

  @IsOptional()
  @Matches(/^[A-Za-z0-9]{1,10}(,[A-Za-z0-9]{1,10})*$/, {
    message: 'WATCHLIST_SYMBOLS must be a comma-separated list of tickers',
  })
  WATCHLIST_SYMBOLS: string = 'AAPL,MSFT,BTC,ETH';
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.map((error) => error.toString()).join('\n'));
  }
  return validatedConfig;
}
