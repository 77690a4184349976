import { Injectable, Logger } from '@nestjs/common';
import { MarketplaceApiClient } from '../marketplace/marketplace-api.client';
import { MarketplaceAuthService } from '../marketplace/marketplace-auth.service';
import { MarketplaceCredentials } from '../marketplace/marketplace.settings';
import { LocalOffer, PriceRefreshReport } from './sync-engine.types';

/**
 * Product-level price update: every uploaded product gets the prices of the first
 * local offer of its article, applied to all of its offers at once.
 */
@Injectable()
export class PriceRefreshService {
    private readonly logger = new Logger(PriceRefreshService.name);

    constructor(
        private readonly authService: MarketplaceAuthService,
        private readonly apiClient: MarketplaceApiClient,
    ) {}

    async refresh(catalog: readonly LocalOffer[], credentials: MarketplaceCredentials): Promise<PriceRefreshReport> {
        const startedAt = new Date().toISOString();
        const firstOfferByArticle = new Map<string, LocalOffer>();
        for (const offer of catalog) {
            if (offer.article !== null && !firstOfferByArticle.has(offer.article)) {
                firstOfferByArticle.set(offer.article, offer);
            }
        }

        const { token } = await this.authService.authenticate(credentials);
        const products = await this.apiClient.fetchAllProducts(token);

        let updated = 0;
        let failed = 0;
        const unmatched: string[] = [];
        for (const product of products) {
            if (product.status.kind !== 'uploaded') {
                continue;
            }
            const offer = firstOfferByArticle.get(product.vendorCode);
            if (!offer) {
                this.logger.warn(`[PRICES] Article ${product.vendorCode} is listed on the marketplace but missing locally`);
                unmatched.push(product.vendorCode);
                continue;
            }
            if (await this.apiClient.updateProductPrices(token, product.productId, offer)) {
                updated++;
            } else {
                this.logger.error(`[PRICES] Could not refresh prices of ${product.vendorCode} (${product.productId})`);
                failed++;
            }
        }

        this.logger.log(`[PRICES] Refreshed ${updated} products, ${failed} failed, ${unmatched.length} missing locally`);
        return {
            startedAt,
            finishedAt: new Date().toISOString(),
            authenticated: token !== null,
            updated,
            failed,
            unmatched,
        };
    }
}
