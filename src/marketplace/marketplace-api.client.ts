import { Inject, Injectable, Logger } from '@nestjs/common';
import { runWithConcurrency } from '../common/concurrency/semaphore';
import {
    CreateVariantTask,
    DeactivateVariantTask,
    LocalOffer,
    RemoteOfferSnapshot,
    RemoteProduct,
    RemoteVariant,
    TargetStatus,
    UpdateVariantTask,
    VariantKey,
    variantKey,
} from '../sync-engine/sync-engine.types';
import { MarketplaceHttpClient } from './marketplace-http.client';
import { MarketplaceMapper } from './marketplace.mapper';
import { MARKETPLACE_SETTINGS, MarketplaceSettings } from './marketplace.settings';
import { MarketplaceListResponse, MarketplaceOfferItem, MarketplaceProductItem } from './marketplace.types';

/**
 * Typed operations over the marketplace REST API. Reads are paged or fanned out,
 * writes go through the transport policy each endpoint needs.
 */
@Injectable()
export class MarketplaceApiClient {
    private readonly logger = new Logger(MarketplaceApiClient.name);

    constructor(
        private readonly httpClient: MarketplaceHttpClient,
        private readonly mapper: MarketplaceMapper,
        @Inject(MARKETPLACE_SETTINGS) private readonly settings: MarketplaceSettings,
    ) {}

    async fetchAllProducts(token: string | null): Promise<RemoteProduct[]> {
        const limit = this.settings.pageSize;
        const items: MarketplaceProductItem[] = [];
        let offset = 0;

        this.logger.debug(`Starting paginated fetch of products, limit ${limit}`);
        for (;;) {
            const page = await this.httpClient.request<MarketplaceListResponse<MarketplaceProductItem>>('GET', 'products', {
                token,
                query: { limit, offset },
            });
            if (page === null) {
                this.logger.warn(`Product listing truncated at offset ${offset}: page could not be fetched, continuing with ${items.length} products`);
                break;
            }
            const pageItems = page.data?.data?.items ?? [];
            if (pageItems.length === 0) {
                break;
            }
            items.push(...pageItems);
            offset += limit;
        }

        const products = this.mapper.mapProducts(items);
        this.logger.log(`Finished paginated fetch of products. Total fetched: ${products.length}`);
        return products;
    }

    /** Offers of one product, or null when the listing could not be read. */
    async fetchProductVariants(token: string | null, product: RemoteProduct): Promise<RemoteVariant[] | null> {
        const response = await this.httpClient.requestWithBackoff<MarketplaceListResponse<MarketplaceOfferItem>>(
            'GET',
            `products/${product.productId}/offers`,
            { token },
        );
        if (response === null) {
            return null;
        }
        return this.mapper.mapOffers(product, response.data?.data?.items ?? []);
    }

    /**
     * Loads the offers of every product, `concurrencyLimit` listings at a time, into a
     * map keyed by (vendor code, size id). Products whose listing could not be read are
     * returned in `unreadable`; their offers are unknown, not absent.
     */
    async fetchVariantSnapshot(token: string | null, products: readonly RemoteProduct[]): Promise<RemoteOfferSnapshot> {
        const results = await runWithConcurrency(products, this.settings.concurrencyLimit, (product) =>
            this.fetchProductVariants(token, product),
        );

        const snapshot = new Map<VariantKey, RemoteVariant>();
        const unreadable = new Set<string>();
        results.forEach((result, index) => {
            const product = products[index];
            if (!result.ok) {
                const reason = result.error instanceof Error ? result.error.message : String(result.error);
                this.logger.error(`Could not load offers of ${product.vendorCode} (${product.productId}): ${reason}`);
                unreadable.add(product.vendorCode);
                return;
            }
            if (result.value === null) {
                this.logger.warn(`No offer listing for ${product.vendorCode} (${product.productId})`);
                unreadable.add(product.vendorCode);
                return;
            }
            for (const variant of result.value) {
                const key = variantKey(variant.vendorCode, variant.sizeId);
                const existing = snapshot.get(key);
                if (existing) {
                    this.logger.warn(`Duplicate offer for ${variant.vendorCode} size ${variant.sizeId}: ${existing.barcode} replaced by ${variant.barcode}`);
                }
                snapshot.set(key, variant);
            }
        });

        this.logger.log(`Loaded ${snapshot.size} offers across ${products.length} products, ${unreadable.size} listings unreadable`);
        return { variants: snapshot, unreadable };
    }

    /** False when the offer is gone (404). Throws once the transport gives up. */
    async updateOffer(token: string | null, task: UpdateVariantTask | DeactivateVariantTask): Promise<boolean> {
        const response = await this.httpClient.requestWithBackoff('PATCH', `products/${task.productId}/offers/${task.barcode}`, {
            token,
            body: this.mapper.toUpdateOfferPayload(task, this.settings.currency),
        });
        return response !== null;
    }

    async createOffer(token: string | null, task: CreateVariantTask): Promise<boolean> {
        const response = await this.httpClient.requestWithBackoff('POST', `products/${task.productId}/offers`, {
            token,
            body: this.mapper.toCreateOfferPayload(task, this.settings.currency),
        });
        return response !== null;
    }

    async changeProductStatus(token: string | null, productId: string, status: TargetStatus): Promise<boolean> {
        const response = await this.httpClient.request('PUT', `products/${productId}/status`, {
            token,
            body: this.mapper.toStatusPayload(status),
        });
        return response !== null;
    }

    async updateProductPrices(token: string | null, productId: string, offer: LocalOffer): Promise<boolean> {
        const response = await this.httpClient.request('PATCH', `products/${productId}/offers/prices`, {
            token,
            body: this.mapper.toProductPricesPayload(offer, this.settings.currency),
        });
        return response !== null;
    }
}
