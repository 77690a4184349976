import { Inject, Injectable, Logger } from '@nestjs/common';
import { runWithConcurrency } from '../common/concurrency/semaphore';
import { MarketplaceApiClient } from '../marketplace/marketplace-api.client';
import { MARKETPLACE_SETTINGS, MarketplaceSettings } from '../marketplace/marketplace.settings';
import { OutcomeCounts, SyncTask, TaskOutcome } from './sync-engine.types';

export function countOutcomes(outcomes: readonly TaskOutcome[]): OutcomeCounts {
    const applied = outcomes.filter((outcome) => outcome.status === 'applied').length;
    return { applied, failed: outcomes.length - applied };
}

function describeTask(task: SyncTask): string {
    return task.kind === 'setStatus'
        ? `${task.kind} ${task.vendorCode} -> ${task.status}`
        : `${task.kind} ${task.vendorCode} size ${task.sizeId} (${task.barcode})`;
}

@Injectable()
export class TaskExecutor {
    private readonly logger = new Logger(TaskExecutor.name);

    constructor(
        private readonly apiClient: MarketplaceApiClient,
        @Inject(MARKETPLACE_SETTINGS) private readonly settings: MarketplaceSettings,
    ) {}

    /**
     * Runs a batch with at most `limit` requests in flight and resolves once every task
     * has an outcome. Outcomes come back in task order.
     */
    async execute<T extends SyncTask>(
        tasks: readonly T[],
        token: string | null,
        label: string,
        limit: number = this.settings.concurrencyLimit,
    ): Promise<TaskOutcome<T>[]> {
        if (tasks.length === 0) {
            return [];
        }
        this.logger.log(`${label}: running ${tasks.length} tasks, ${limit} at a time`);

        const results = await runWithConcurrency(tasks, limit, (task) => this.dispatch(task, token));
        const outcomes = results.map((result, index): TaskOutcome<T> => {
            const task = tasks[index];
            if (!result.ok) {
                const message = result.error instanceof Error ? result.error.message : String(result.error);
                this.logger.error(`${label}: ${describeTask(task)} failed: ${message}`);
                return { task, status: 'failed', error: message };
            }
            if (!result.value) {
                this.logger.warn(`${label}: ${describeTask(task)} was not applied, target not found`);
                return { task, status: 'failed', error: 'not found' };
            }
            return { task, status: 'applied' };
        });

        const counts = countOutcomes(outcomes);
        this.logger.log(`${label}: ${counts.applied} applied, ${counts.failed} failed`);
        return outcomes;
    }

    private dispatch(task: SyncTask, token: string | null): Promise<boolean> {
        switch (task.kind) {
            case 'update':
            case 'deactivate':
                return this.apiClient.updateOffer(token, task);
            case 'create':
                return this.apiClient.createOffer(token, task);
            case 'setStatus':
                return this.apiClient.changeProductStatus(token, task.productId, task.status);
        }
    }
}
