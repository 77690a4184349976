import { plainToInstance } from 'class-transformer';
import { IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
    @IsOptional()
    @IsInt()
    @Min(1)
    @Max(65535)
    PORT: number = 3000;

    @IsString()
    @IsNotEmpty()
    REDIS_URL: string = 'redis://localhost:6379';

    @IsUrl({ require_tld: false, require_protocol: true })
    MARKETPLACE_BASE_URL!: string;

    @IsString()
    @IsNotEmpty()
    MARKETPLACE_APP_KEY!: string;

    @IsString()
    @IsNotEmpty()
    MARKETPLACE_APP_SECRET!: string;

    @IsString()
    @IsNotEmpty()
    MARKETPLACE_CURRENCY: string = 'UAH';

    @IsInt()
    @Min(1)
    MARKETPLACE_PAGE_SIZE: number = 300;

    @IsInt()
    @Min(1)
    MARKETPLACE_REQUEST_TIMEOUT_MS: number = 30000;

    @IsInt()
    @Min(1)
    MARKETPLACE_RETRY_ATTEMPTS: number = 3;

    @IsInt()
    @Min(0)
    MARKETPLACE_RETRY_DELAY_MS: number = 3000;

    @IsInt()
    @Min(1)
    MARKETPLACE_BACKOFF_ATTEMPTS: number = 10;

    @IsInt()
    @Min(0)
    MARKETPLACE_BACKOFF_DELAY_MS: number = 10000;

    @IsNumber()
    @Min(1)
    MARKETPLACE_BACKOFF_FACTOR: number = 1.5;

    @IsInt()
    @Min(0)
    MARKETPLACE_BACKOFF_MAX_DELAY_MS: number = 300000;

    // 0 keeps retrying forever
    @IsInt()
    @Min(0)
    MARKETPLACE_BACKOFF_MAX_ROUNDS: number = 3;

    @IsInt()
    @Min(1)
    SYNC_CONCURRENCY_LIMIT: number = 10;

    @IsString()
    @IsNotEmpty()
    SIZE_MAPPING_PATH: string = 'data/size-mapping.csv';
}

/**
 * Used as `ConfigModule.forRoot({ validate })`. Converts string env values to their
 * declared types and fails startup listing every invalid key.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
    const validatedConfig = plainToInstance(EnvironmentVariables, config, {
        enableImplicitConversion: true,
    });
    const errors = validateSync(validatedConfig, { skipMissingProperties: false });

    if (errors.length > 0) {
        const details = errors
            .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${details}`);
    }
    return validatedConfig;
}
