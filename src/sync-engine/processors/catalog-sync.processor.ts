import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../../config/env.validation';
import { loadMarketplaceCredentials } from '../../marketplace/marketplace.settings';
import { PriceRefreshService } from '../price-refresh.service';
import { SyncCoordinatorService } from '../sync-coordinator.service';
import { CATALOG_SYNC_QUEUE, REFRESH_PRICES_JOB, SYNCHRONIZE_CATALOG_JOB } from '../sync-engine.constants';
import { CatalogSyncJobData, CatalogSyncJobResult } from '../sync-jobs.service';

// One job at a time: runs must never overlap against the same marketplace account
@Processor(CATALOG_SYNC_QUEUE, { concurrency: 1 })
export class CatalogSyncProcessor extends WorkerHost {
    private readonly logger = new Logger(CatalogSyncProcessor.name);

    constructor(
        private readonly syncCoordinatorService: SyncCoordinatorService,
        private readonly priceRefreshService: PriceRefreshService,
        private readonly configService: ConfigService<EnvironmentVariables, true>,
    ) {
        super();
    }

    async process(job: Job<CatalogSyncJobData, CatalogSyncJobResult, string>): Promise<CatalogSyncJobResult> {
        return this.run(job.name, job.data, job.id);
    }

    async run(name: string, data: CatalogSyncJobData, jobId?: string): Promise<CatalogSyncJobResult> {
        this.logger.log(`[CATALOG SYNC JOB] Processing job ${jobId} (${name}) with ${data.offers.length} offers`);
        const credentials = loadMarketplaceCredentials(this.configService);

        try {
            switch (name) {
                case SYNCHRONIZE_CATALOG_JOB:
                    return await this.syncCoordinatorService.synchronize(data.offers, credentials);
                case REFRESH_PRICES_JOB:
                    return await this.priceRefreshService.refresh(data.offers, credentials);
                default:
                    throw new Error(`Unknown job name: ${name}`);
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error(`[CATALOG SYNC JOB] Job ${jobId} failed: ${message}`, error instanceof Error ? error.stack : undefined);
            throw error;
        }
    }
}
