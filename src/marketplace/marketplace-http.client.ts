import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { MARKETPLACE_SETTINGS, MarketplaceSettings } from './marketplace.settings';
import { HttpMethod, MarketplaceRequestOptions, MarketplaceResponse } from './marketplace.types';
import { MarketplaceRequestError } from './marketplace-request.error';

export function httpStatusOf(error: unknown): number | null {
    if (axios.isAxiosError(error) && error.response) {
        return error.response.status;
    }
    return null;
}

export function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        return error.response ? `HTTP ${error.response.status}` : `${error.code ?? 'network error'}: ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
}

/**
 * Reads a Retry-After value (delta seconds or an HTTP date) as milliseconds.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) && value >= 0 ? value * 1000 : null;
    }
    if (typeof value !== 'string' || value.trim() === '') {
        return null;
    }
    const seconds = Number(value.trim());
    if (Number.isFinite(seconds)) {
        return seconds >= 0 ? seconds * 1000 : null;
    }
    const date = Date.parse(value);
    return Number.isNaN(date) ? null : Math.max(0, date - now);
}

function retryAfterOf(error: unknown): number | null {
    if (!axios.isAxiosError(error) || !error.response) {
        return null;
    }
    const headers: Record<string, unknown> = { ...error.response.headers };
    return parseRetryAfter(headers['retry-after']);
}

@Injectable()
export class MarketplaceHttpClient {
    private readonly logger = new Logger(MarketplaceHttpClient.name);
    public readonly axiosInstance: AxiosInstance;

    constructor(@Inject(MARKETPLACE_SETTINGS) private readonly settings: MarketplaceSettings) {
        this.axiosInstance = axios.create({
            baseURL: settings.baseUrl,
            timeout: settings.requestTimeoutMs,
            headers: {
                'Accept': 'application/json',
                'Content-Type': 'application/json',
            },
        });

        this.axiosInstance.interceptors.request.use((request) => {
            this.logger.debug(`[Marketplace API Request] ${request.method?.toUpperCase()} ${request.url}`);
            return request;
        });
        this.axiosInstance.interceptors.response.use(
            (response) => {
                this.logger.debug(`[Marketplace API Response] Status: ${response.status} for ${response.config.method?.toUpperCase()} ${response.config.url}`);
                return response;
            },
            (error: unknown) => {
                if (axios.isAxiosError(error)) {
                    this.logger.warn(`[Marketplace API Error] ${describeHttpError(error)} for ${error.config?.method?.toUpperCase()} ${error.config?.url}`);
                }
                return Promise.reject(error);
            },
        );
    }

    /**
     * Bounded request: a fixed number of attempts with a fixed pause between them.
     * Returns null when every attempt failed, so callers treat the operation as not
     * applied this run.
     */
    async request<T>(method: HttpMethod, path: string, options: MarketplaceRequestOptions = {}): Promise<MarketplaceResponse<T> | null> {
        const { attempts, delayMs } = this.settings.retry;
        let lastError: unknown = null;

        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                return await this.send<T>(method, path, options);
            } catch (error) {
                lastError = error;
                if (attempt < attempts) {
                    this.logger.warn(`${method} ${path} attempt ${attempt}/${attempts} failed (${describeHttpError(error)}), retrying in ${delayMs}ms`);
                    await this.wait(delayMs);
                }
            }
        }

        this.logTerminalFailure(method, path, options, lastError, attempts);
        return null;
    }

    /**
     * Persistent request used for offer reads and writes.
     *
     * 404 resolves to null at once. 429 sleeps for the server's Retry-After hint and
     * does not count as an attempt. Anything else counts, and when a round of attempts
     * is spent the delay grows by the backoff factor (up to the max delay) and a new
     * round starts. After `maxRounds` rounds a MarketplaceRequestError is thrown;
     * `maxRounds = 0` never gives up.
     */
    async requestWithBackoff<T>(method: HttpMethod, path: string, options: MarketplaceRequestOptions = {}): Promise<MarketplaceResponse<T> | null> {
        const policy = this.settings.backoff;
        let delay = policy.initialDelayMs;
        let totalAttempts = 0;
        let lastError: unknown = null;

        for (let round = 1; ; round++) {
            let attempt = 0;
            while (attempt < policy.attemptsPerRound) {
                try {
                    return await this.send<T>(method, path, options);
                } catch (error) {
                    lastError = error;
                    const status = httpStatusOf(error);

                    if (status === 404) {
                        this.logger.debug(`${method} ${path} returned 404, nothing to retry`);
                        return null;
                    }
                    if (status === 429) {
                        const waitMs = retryAfterOf(error) ?? delay;
                        this.logger.warn(`429 Too Many Requests for ${method} ${path}, sleeping ${waitMs}ms`);
                        await this.wait(waitMs);
                        continue;
                    }

                    attempt++;
                    totalAttempts++;
                    this.logger.warn(`${describeHttpError(error)}: attempt=${round}-${attempt} for ${method} ${path}`);
                    if (attempt < policy.attemptsPerRound) {
                        await this.wait(delay);
                    }
                }
            }

            this.logTerminalFailure(method, path, options, lastError, totalAttempts);
            if (policy.maxRounds !== 0 && round >= policy.maxRounds) {
                break;
            }
            delay = Math.min(delay * policy.factor, policy.maxDelayMs);
            this.logger.warn(`Retry round ${round + 1} for ${method} ${path} after ${delay}ms`);
            await this.wait(delay);
        }

        throw new MarketplaceRequestError(method, path, httpStatusOf(lastError), totalAttempts, lastError);
    }

    wait(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }

    private async send<T>(method: HttpMethod, path: string, options: MarketplaceRequestOptions): Promise<MarketplaceResponse<T>> {
        const response = await this.axiosInstance.request<T | ''>({
            method,
            url: path,
            params: options.query,
            data: options.body,
            headers: options.token ? { Authorization: `Bearer ${options.token}` } : {},
        });
        const data = response.data;
        if (data === '' || data === undefined || data === null) {
            return { status: response.status, data: null };
        }
        return { status: response.status, data };
    }

    private logTerminalFailure(
        method: HttpMethod,
        path: string,
        options: MarketplaceRequestOptions,
        error: unknown,
        attempts: number,
    ): void {
        this.logger.error(`Max retries reached (${attempts}) for ${method} ${path}: ${describeHttpError(error)}`);
        this.logger.error(`Params: ${JSON.stringify(options.query ?? {})}, JSON Data: ${JSON.stringify(options.body ?? null)}`);
        if (axios.isAxiosError(error) && error.response) {
            this.logger.error(`Response Body: ${JSON.stringify(error.response.data)}`);
        }
    }
}
