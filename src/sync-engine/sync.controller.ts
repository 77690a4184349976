import { Body, Controller, Get, HttpCode, HttpStatus, Logger, NotFoundException, Param, Post, ValidationPipe } from '@nestjs/common';
import { SynchronizeCatalogDto, toLocalOffers } from './dto/synchronize-catalog.dto';
import { CatalogSyncJobStatus, SyncJobsService } from './sync-jobs.service';

@Controller('sync')
export class SyncController {
    private readonly logger = new Logger(SyncController.name);

    constructor(private readonly syncJobsService: SyncJobsService) {}

    @Post()
    @HttpCode(HttpStatus.ACCEPTED)
    async synchronize(@Body(ValidationPipe) body: SynchronizeCatalogDto): Promise<{ jobId: string }> {
        this.logger.log(`Request to synchronize ${body.offers.length} offers`);
        const jobId = await this.syncJobsService.queueSynchronization(toLocalOffers(body));
        return { jobId };
    }

    @Post('prices')
    @HttpCode(HttpStatus.ACCEPTED)
    async refreshPrices(@Body(ValidationPipe) body: SynchronizeCatalogDto): Promise<{ jobId: string }> {
        this.logger.log(`Request to refresh prices from ${body.offers.length} offers`);
        const jobId = await this.syncJobsService.queuePriceRefresh(toLocalOffers(body));
        return { jobId };
    }

    @Get('jobs/:jobId')
    async getJob(@Param('jobId') jobId: string): Promise<CatalogSyncJobStatus> {
        const status = await this.syncJobsService.getJobStatus(jobId);
        if (!status) {
            throw new NotFoundException(`Job ${jobId} not found`);
        }
        return status;
    }
}
