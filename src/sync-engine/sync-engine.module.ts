import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { SizeMappingModule } from '../size-mapping/size-mapping.module';
import { CatalogCategorizer } from './catalog-categorizer.service';
import { DeactivationPlanner } from './deactivation.planner';
import { OfferUpdatePlanner } from './offer-update.planner';
import { PriceRefreshService } from './price-refresh.service';
import { CatalogSyncProcessor } from './processors/catalog-sync.processor';
import { StatusTransitionService } from './status-transition.service';
import { SyncCoordinatorService } from './sync-coordinator.service';
import { CATALOG_SYNC_QUEUE } from './sync-engine.constants';
import { SyncJobsService } from './sync-jobs.service';
import { SyncController } from './sync.controller';
import { TaskExecutor } from './task-executor.service';

@Module({
    imports: [
        ConfigModule,
        MarketplaceModule,
        SizeMappingModule,
        BullModule.forRootAsync({
            imports: [ConfigModule],
            useFactory: (configService: ConfigService<EnvironmentVariables, true>) => {
                const redisUrl = new URL(configService.get('REDIS_URL', { infer: true }));
                return {
                    connection: {
                        host: redisUrl.hostname,
                        port: Number(redisUrl.port || 6379),
                        password: redisUrl.password || undefined,
                        username: redisUrl.username || undefined,
                        ...(redisUrl.protocol === 'rediss:' ? { tls: {} } : {}),
                    },
                    defaultJobOptions: {
                        // a failed run is picked up by the next one, not retried
                        attempts: 1,
                        removeOnComplete: {
                            count: 1000,
                            age: 24 * 60 * 60,
                        },
                        removeOnFail: {
                            count: 5000,
                            age: 7 * 24 * 60 * 60,
                        },
                    },
                };
            },
            inject: [ConfigService],
        }),
        BullModule.registerQueue({ name: CATALOG_SYNC_QUEUE }),
    ],
    controllers: [SyncController],
    providers: [
        CatalogCategorizer,
        StatusTransitionService,
        OfferUpdatePlanner,
        DeactivationPlanner,
        TaskExecutor,
        SyncCoordinatorService,
        PriceRefreshService,
        SyncJobsService,
        CatalogSyncProcessor,
    ],
    exports: [SyncCoordinatorService, PriceRefreshService],
})
export class SyncEngineModule {}
