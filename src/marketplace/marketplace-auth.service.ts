import { Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import { MarketplaceHttpClient, describeHttpError } from './marketplace-http.client';
import { MarketplaceCredentials } from './marketplace.settings';
import { MarketplaceAuthResponse } from './marketplace.types';

export interface MarketplaceSession {
    token: string | null;
    expiresAt: number | null;
}

@Injectable()
export class MarketplaceAuthService {
    private readonly logger = new Logger(MarketplaceAuthService.name);

    constructor(private readonly httpClient: MarketplaceHttpClient) {}

    /**
     * Exchanges the application key/secret for a bearer token. A single request: any
     * failure yields an absent session and later calls fail as ordinary HTTP errors.
     */
    async authenticate(credentials: MarketplaceCredentials): Promise<MarketplaceSession> {
        try {
            const response = await this.httpClient.axiosInstance.post<MarketplaceAuthResponse | string>('auth', {
                app_key: credentials.appKey,
                app_secret: credentials.appSecret,
            });
            const body = response.data;
            const accessToken = typeof body === 'object' && body !== null ? body.data?.access_token : undefined;
            const token = accessToken?.token;
            const expiresAt = accessToken?.expires_date;

            if (typeof token === 'string' && token !== '' && typeof expiresAt === 'number' && Number.isInteger(expiresAt)) {
                this.logger.log(`Authenticated against marketplace, token expires_date=${expiresAt}`);
                return { token, expiresAt };
            }
            this.logger.error('Token or expires_date missing or has invalid type in auth response.');
            this.logger.debug(`Received data: ${JSON.stringify(body)}`);
        } catch (error) {
            if (axios.isAxiosError(error) && error.response) {
                this.logger.error(`HTTP Error: ${error.response.status} while trying to auth`);
                this.logger.error(`Response Body: ${JSON.stringify(error.response.data)}`);
            } else {
                this.logger.error(`Request failed during authentication: ${describeHttpError(error)}`);
            }
        }
        return { token: null, expiresAt: null };
    }
}
