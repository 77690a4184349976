import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';

export const MARKETPLACE_SETTINGS = Symbol('MARKETPLACE_SETTINGS');

export interface BoundedRetryPolicy {
    attempts: number;
    delayMs: number;
}

export interface BackoffRetryPolicy {
    attemptsPerRound: number;
    initialDelayMs: number;
    factor: number;
    maxDelayMs: number;
    /** 0 means the outer loop never gives up. */
    maxRounds: number;
}

export interface MarketplaceSettings {
    baseUrl: string;
    currency: string;
    pageSize: number;
    requestTimeoutMs: number;
    concurrencyLimit: number;
    retry: BoundedRetryPolicy;
    backoff: BackoffRetryPolicy;
}

export interface MarketplaceCredentials {
    appKey: string;
    appSecret: string;
}

export function loadMarketplaceSettings(config: ConfigService<EnvironmentVariables, true>): MarketplaceSettings {
    return {
        baseUrl: config.get('MARKETPLACE_BASE_URL', { infer: true }),
        currency: config.get('MARKETPLACE_CURRENCY', { infer: true }),
        pageSize: config.get('MARKETPLACE_PAGE_SIZE', { infer: true }),
        requestTimeoutMs: config.get('MARKETPLACE_REQUEST_TIMEOUT_MS', { infer: true }),
        concurrencyLimit: config.get('SYNC_CONCURRENCY_LIMIT', { infer: true }),
        retry: {
            attempts: config.get('MARKETPLACE_RETRY_ATTEMPTS', { infer: true }),
            delayMs: config.get('MARKETPLACE_RETRY_DELAY_MS', { infer: true }),
        },
        backoff: {
            attemptsPerRound: config.get('MARKETPLACE_BACKOFF_ATTEMPTS', { infer: true }),
            initialDelayMs: config.get('MARKETPLACE_BACKOFF_DELAY_MS', { infer: true }),
            factor: config.get('MARKETPLACE_BACKOFF_FACTOR', { infer: true }),
            maxDelayMs: config.get('MARKETPLACE_BACKOFF_MAX_DELAY_MS', { infer: true }),
            maxRounds: config.get('MARKETPLACE_BACKOFF_MAX_ROUNDS', { infer: true }),
        },
    };
}

export function loadMarketplaceCredentials(config: ConfigService<EnvironmentVariables, true>): MarketplaceCredentials {
    return {
        appKey: config.get('MARKETPLACE_APP_KEY', { infer: true }),
        appSecret: config.get('MARKETPLACE_APP_SECRET', { infer: true }),
    };
}
