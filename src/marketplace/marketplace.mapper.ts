import { Injectable, Logger } from '@nestjs/common';
import { parseRemoteStatus } from '../sync-engine/remote-status';
import {
    CreateVariantTask,
    DeactivateVariantTask,
    LocalOffer,
    RemoteProduct,
    RemoteVariant,
    TargetStatus,
    UpdateVariantTask,
} from '../sync-engine/sync-engine.types';
import {
    ChangeProductStatusPayload,
    CreateOfferPayload,
    MarketplaceMoney,
    MarketplaceOfferItem,
    MarketplaceProductItem,
    UpdateOfferPayload,
    UpdateProductPricesPayload,
} from './marketplace.types';

function toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.trim());
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

function nonEmpty(value: unknown): string | null {
    if (typeof value === 'string' && value.trim() !== '') {
        return value.trim();
    }
    return null;
}

@Injectable()
export class MarketplaceMapper {
    private readonly logger = new Logger(MarketplaceMapper.name);

    mapProducts(items: MarketplaceProductItem[]): RemoteProduct[] {
        const products: RemoteProduct[] = [];
        for (const item of items) {
            const vendorCode = nonEmpty(item.vendor_code);
            const productId = nonEmpty(item.article);
            if (!vendorCode || !productId) {
                this.logger.warn(`Skipping marketplace product without vendor code or article: ${JSON.stringify(item)}`);
                continue;
            }
            products.push({ vendorCode, productId, status: parseRemoteStatus(item.status?.code) });
        }
        return products;
    }

    /**
     * Offers inherit the product's status. Missing prices or quantity read as 0 so the
     * variant is still tracked and a mismatch forces an update.
     */
    mapOffers(product: RemoteProduct, items: MarketplaceOfferItem[]): RemoteVariant[] {
        const variants: RemoteVariant[] = [];
        for (const item of items) {
            const barcode = nonEmpty(item.barcode);
            const sizeId = toNumber(item.size_id);
            if (!barcode || sizeId === null || !Number.isInteger(sizeId)) {
                this.logger.warn(`Skipping offer of ${product.vendorCode} without barcode or size id: ${JSON.stringify(item)}`);
                continue;
            }
            variants.push({
                vendorCode: product.vendorCode,
                productId: product.productId,
                sizeId,
                barcode,
                basePrice: toNumber(item.base_price) ?? 0,
                discountPrice: toNumber(item.discount_price) ?? 0,
                active: item.active === true,
                quantity: toNumber(item.quantity) ?? 0,
                status: product.status,
            });
        }
        return variants;
    }

    toUpdateOfferPayload(task: UpdateVariantTask | DeactivateVariantTask, currency: string): UpdateOfferPayload {
        const isDeactivation = task.kind === 'deactivate';
        return {
            base_price: this.money(task.price, currency),
            discount_price: this.money(task.discountPrice, currency),
            active: isDeactivation ? false : task.active,
            quantity: isDeactivation ? 0 : task.quantity,
        };
    }

    toCreateOfferPayload(task: CreateVariantTask, currency: string): CreateOfferPayload {
        return {
            barcode: task.barcode,
            active: true,
            base_price: this.money(task.price, currency),
            discount_price: this.money(task.discountPrice, currency),
            quantity: task.quantity,
            size_id: task.sizeId,
        };
    }

    toProductPricesPayload(offer: LocalOffer, currency: string): UpdateProductPricesPayload {
        return {
            active: true,
            base_price: this.money(offer.price, currency),
            discount_price: this.money(offer.discountPrice, currency),
        };
    }

    toStatusPayload(status: TargetStatus): ChangeProductStatusPayload {
        return { status };
    }

    private money(amount: number, currency: string): MarketplaceMoney {
        return { amount, currency };
    }
}
