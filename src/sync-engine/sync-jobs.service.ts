import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { randomUUID } from 'crypto';
import { CATALOG_SYNC_QUEUE, CatalogSyncJobName, REFRESH_PRICES_JOB, SYNCHRONIZE_CATALOG_JOB } from './sync-engine.constants';
import { LocalOffer, PriceRefreshReport, SyncReport } from './sync-engine.types';

export interface CatalogSyncJobData {
    offers: LocalOffer[];
}

export type CatalogSyncJobResult = SyncReport | PriceRefreshReport;

export interface CatalogSyncJobStatus {
    id: string;
    name: string;
    state: string;
    result: CatalogSyncJobResult | null;
    failedReason: string | null;
}

@Injectable()
export class SyncJobsService {
    private readonly logger = new Logger(SyncJobsService.name);

    constructor(
        @InjectQueue(CATALOG_SYNC_QUEUE) private readonly catalogSyncQueue: Queue<CatalogSyncJobData, CatalogSyncJobResult, CatalogSyncJobName>,
    ) {}

    queueSynchronization(offers: LocalOffer[]): Promise<string> {
        return this.queue(SYNCHRONIZE_CATALOG_JOB, offers);
    }

    queuePriceRefresh(offers: LocalOffer[]): Promise<string> {
        return this.queue(REFRESH_PRICES_JOB, offers);
    }

    async getJobStatus(jobId: string): Promise<CatalogSyncJobStatus | null> {
        const job = await this.catalogSyncQueue.getJob(jobId);
        if (!job) {
            return null;
        }
        return {
            id: jobId,
            name: job.name,
            state: await job.getState(),
            result: job.returnvalue ?? null,
            failedReason: job.failedReason || null,
        };
    }

    private async queue(name: CatalogSyncJobName, offers: LocalOffer[]): Promise<string> {
        const jobId = `${name}-${randomUUID()}`;
        const job = await this.catalogSyncQueue.add(name, { offers }, { jobId });
        this.logger.log(`${name} job ${job.id ?? jobId} queued with ${offers.length} offers.`);
        return job.id ?? jobId;
    }
}
