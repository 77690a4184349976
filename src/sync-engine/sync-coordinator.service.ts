import { Injectable, Logger } from '@nestjs/common';
import { MarketplaceApiClient } from '../marketplace/marketplace-api.client';
import { MarketplaceAuthService } from '../marketplace/marketplace-auth.service';
import { MarketplaceCredentials } from '../marketplace/marketplace.settings';
import { CatalogCategorizer } from './catalog-categorizer.service';
import { DeactivationPlanner } from './deactivation.planner';
import { OfferUpdatePlanner } from './offer-update.planner';
import { StatusTransitionService } from './status-transition.service';
import { LocalOffer, SetStatusTask, SyncReport, TaskOutcome } from './sync-engine.types';
import { TaskExecutor, countOutcomes } from './task-executor.service';

/**
 * One full reconciliation of the local catalog against the marketplace. Phases run
 * strictly one after another; each network batch settles before the next starts.
 */
@Injectable()
export class SyncCoordinatorService {
    private readonly logger = new Logger(SyncCoordinatorService.name);

    constructor(
        private readonly authService: MarketplaceAuthService,
        private readonly apiClient: MarketplaceApiClient,
        private readonly categorizer: CatalogCategorizer,
        private readonly statusTransitions: StatusTransitionService,
        private readonly offerPlanner: OfferUpdatePlanner,
        private readonly deactivationPlanner: DeactivationPlanner,
        private readonly executor: TaskExecutor,
    ) {}

    async synchronize(catalog: readonly LocalOffer[], credentials: MarketplaceCredentials): Promise<SyncReport> {
        const startedAt = new Date().toISOString();
        this.logger.log(`[SYNC] Starting reconciliation of ${catalog.length} local offers`);

        const session = await this.authService.authenticate(credentials);
        const token = session.token;
        if (!token) {
            this.logger.error('[SYNC] No marketplace token, every call of this run will go out unauthenticated');
        }

        // Snapshot
        const products = await this.apiClient.fetchAllProducts(token);
        const snapshot = await this.apiClient.fetchVariantSnapshot(token, products);
        const localArticles = catalog.flatMap((offer) => (offer.article === null ? [] : [offer.article]));
        const categories = this.categorizer.categorize(products, localArticles);

        // Open products for editing
        const prePass = this.statusTransitions.planPrePass(categories);
        const drafted: TaskOutcome<SetStatusTask>[] = await this.statusTransitions.apply(prePass.tasks, token);

        const plan = this.offerPlanner.plan(catalog, categories, snapshot, prePass.drafted);
        drafted.push(...(await this.statusTransitions.apply(this.statusTransitions.planDrafts(plan.draftRequests, categories), token)));

        const offerWrites = await this.executor.execute(plan.tasks, token, 'Updating offers');

        // Deactivate against the state the writes left behind
        const refreshedProducts = await this.apiClient.fetchAllProducts(token);
        const refreshedSnapshot = await this.apiClient.fetchVariantSnapshot(token, refreshedProducts);
        const deactivationTasks = this.deactivationPlanner.plan(refreshedSnapshot.variants, plan.used);
        const deactivations = await this.executor.execute(deactivationTasks, token, 'Deactivating offers');

        const moderation = new Set([...prePass.pendingModeration, ...plan.moderation]);
        const restored = await this.statusTransitions.apply(this.statusTransitions.planPostPass(moderation, categories), token);

        const report: SyncReport = {
            startedAt,
            finishedAt: new Date().toISOString(),
            authenticated: token !== null,
            remoteProducts: products.length,
            remoteVariants: snapshot.variants.size,
            localOffers: catalog.length,
            categories: {
                matched: categories.matched.size,
                remoteOnly: categories.remoteOnly.size,
                localOnly: categories.localOnly.size,
                notUploaded: categories.notUploaded.size,
                notApproved: categories.notApprovedArticles.size,
            },
            planned: {
                updates: plan.tasks.length - plan.created,
                creates: plan.created,
                deactivations: deactivationTasks.length,
            },
            skipped: plan.skipped,
            statusChanges: {
                drafted: countOutcomes(drafted),
                restored: countOutcomes(restored),
            },
            offerWrites: countOutcomes(offerWrites),
            deactivations: countOutcomes(deactivations),
        };

        this.logger.log(
            `[SYNC] Finished: ${report.offerWrites.applied}/${plan.tasks.length} offer writes, ` +
                `${report.deactivations.applied}/${deactivationTasks.length} deactivations, ` +
                `${report.offerWrites.failed + report.deactivations.failed} failed`,
        );
        return report;
    }
}
