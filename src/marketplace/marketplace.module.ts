import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { MarketplaceApiClient } from './marketplace-api.client';
import { MarketplaceAuthService } from './marketplace-auth.service';
import { MarketplaceHttpClient } from './marketplace-http.client';
import { MarketplaceMapper } from './marketplace.mapper';
import { MARKETPLACE_SETTINGS, loadMarketplaceSettings } from './marketplace.settings';

@Module({
    imports: [ConfigModule],
    providers: [
        {
            provide: MARKETPLACE_SETTINGS,
            useFactory: (configService: ConfigService<EnvironmentVariables, true>) => loadMarketplaceSettings(configService),
            inject: [ConfigService],
        },
        MarketplaceHttpClient,
        MarketplaceAuthService,
        MarketplaceMapper,
        MarketplaceApiClient,
    ],
    exports: [MARKETPLACE_SETTINGS, MarketplaceAuthService, MarketplaceApiClient],
})
export class MarketplaceModule {}
