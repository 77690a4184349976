import { Injectable, Logger } from '@nestjs/common';
import { MarketplaceApiClient } from '../marketplace/marketplace-api.client';
import { CatalogCategories, SetStatusTask, StatusPrePass, TargetStatus, TaskOutcome } from './sync-engine.types';

@Injectable()
export class StatusTransitionService {
    private readonly logger = new Logger(StatusTransitionService.name);

    constructor(private readonly apiClient: MarketplaceApiClient) {}

    /**
     * Remote-only products that are still live go back to draft, and products under
     * moderation are opened for editing. The latter are restored by the post-pass.
     */
    planPrePass(categories: CatalogCategories): StatusPrePass {
        const drafted = new Set<string>();
        for (const article of categories.remoteOnly) {
            if (!categories.notUploaded.has(article)) {
                drafted.add(article);
            }
        }
        for (const article of categories.moderateArticles) {
            drafted.add(article);
        }

        return {
            tasks: this.toTasks(drafted, 'draft', categories),
            pendingModeration: new Set(categories.moderateArticles),
            drafted,
        };
    }

    /** Draft changes the offer planner asked for on top of the pre-pass. */
    planDrafts(articles: Iterable<string>, categories: CatalogCategories): SetStatusTask[] {
        return this.toTasks(new Set(articles), 'draft', categories);
    }

    planPostPass(moderation: Iterable<string>, categories: CatalogCategories): SetStatusTask[] {
        return this.toTasks(new Set(moderation), 'moderate', categories);
    }

    /** Runs status changes one at a time. A failed change is logged and the rest continue. */
    async apply(tasks: readonly SetStatusTask[], token: string | null): Promise<TaskOutcome<SetStatusTask>[]> {
        const outcomes: TaskOutcome<SetStatusTask>[] = [];
        for (const task of tasks) {
            try {
                const applied = await this.apiClient.changeProductStatus(token, task.productId, task.status);
                if (applied) {
                    this.logger.log(`Product ${task.vendorCode} (${task.productId}) moved to ${task.status}`);
                    outcomes.push({ task, status: 'applied' });
                } else {
                    this.logger.error(`Could not move product ${task.vendorCode} (${task.productId}) to ${task.status}`);
                    outcomes.push({ task, status: 'failed', error: 'status change not applied' });
                }
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                this.logger.error(`Status change of ${task.vendorCode} to ${task.status} failed: ${message}`);
                outcomes.push({ task, status: 'failed', error: message });
            }
        }
        return outcomes;
    }

    private toTasks(articles: Iterable<string>, status: TargetStatus, categories: CatalogCategories): SetStatusTask[] {
        const tasks: SetStatusTask[] = [];
        for (const vendorCode of articles) {
            const productId = categories.articleToId.get(vendorCode);
            if (productId === undefined) {
                this.logger.warn(`No marketplace product for ${vendorCode}, cannot move it to ${status}`);
                continue;
            }
            tasks.push({ kind: 'setStatus', vendorCode, productId, status });
        }
        return tasks;
    }
}
