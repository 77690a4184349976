import { Injectable, Logger } from '@nestjs/common';
import { SizeMappingService } from '../size-mapping/size-mapping.service';
import {
    CatalogCategories,
    CreateVariantTask,
    LocalOffer,
    OfferPlan,
    RemoteOfferSnapshot,
    RemoteVariant,
    SkipReason,
    UpdateVariantTask,
    VariantKey,
    variantKey,
} from './sync-engine.types';

export interface DesiredOfferState {
    price: number;
    discountPrice: number;
    quantity: number;
    active: boolean;
}

export function desiredStateOf(offer: LocalOffer): DesiredOfferState {
    return {
        price: offer.price,
        discountPrice: offer.discountPrice,
        quantity: offer.available ? offer.stockQuantity ?? 0 : 0,
        active: offer.available,
    };
}

const toCents = (amount: number): number => Math.round(amount * 100);

export function variantMatches(variant: RemoteVariant, desired: DesiredOfferState): boolean {
    return (
        toCents(variant.basePrice) === toCents(desired.price) &&
        toCents(variant.discountPrice) === toCents(desired.discountPrice) &&
        variant.quantity === desired.quantity &&
        variant.active === desired.active
    );
}

@Injectable()
export class OfferUpdatePlanner {
    private readonly logger = new Logger(OfferUpdatePlanner.name);

    constructor(private readonly sizeMapping: SizeMappingService) {}

    /**
     * One pass over the local offers. Each offer yields at most one create or update;
     * every variant key an offer lands on is marked used so the deactivation pass
     * leaves it alone. `alreadyDrafted` holds articles the pre-pass moved to draft.
     * Articles whose offer listing could not be read get no writes and no status change.
     */
    plan(
        offers: readonly LocalOffer[],
        categories: CatalogCategories,
        snapshot: RemoteOfferSnapshot,
        alreadyDrafted: ReadonlySet<string> = new Set(),
    ): OfferPlan {
        const tasks: Array<UpdateVariantTask | CreateVariantTask> = [];
        const used = new Set<VariantKey>();
        const moderation = new Set<string>();
        const draftRequests = new Set<string>();
        const skipped: Record<SkipReason, number> = {
            missing_article: 0,
            local_only: 0,
            unmapped_size: 0,
            duplicate_variant: 0,
            unknown_variants: 0,
        };
        let created = 0;

        const requestDraft = (article: string) => {
            moderation.add(article);
            if (!categories.draftList.has(article) && !alreadyDrafted.has(article)) {
                draftRequests.add(article);
            }
        };

        for (const offer of offers) {
            const article = offer.article;
            if (article === null) {
                skipped.missing_article++;
                continue;
            }
            const productId = categories.articleToId.get(article);
            if (categories.localOnly.has(article) || productId === undefined) {
                this.logger.warn(`Article ${article} (offer ${offer.id}) is not listed on the marketplace`);
                skipped.local_only++;
                continue;
            }
            const listingUnreadable = snapshot.unreadable.has(article);
            if (categories.notUploaded.has(article) && !listingUnreadable) {
                this.logger.warn(`Article ${article} is not uploaded yet, queueing it for moderation`);
                requestDraft(article);
            }

            const size = this.sizeMapping.resolve(offer.sizeLabel);
            if (!size) {
                this.logger.warn(`No size mapping for "${offer.sizeLabel}" (offer ${offer.id}, article ${article})`);
                skipped.unmapped_size++;
                continue;
            }

            const key = variantKey(article, size.sizeId);
            if (used.has(key)) {
                this.logger.warn(`Offer ${offer.id} resolves to ${article} size ${size.sizeId} which another offer already covers`);
                skipped.duplicate_variant++;
                continue;
            }
            used.add(key);

            if (listingUnreadable) {
                this.logger.warn(`Offers of ${article} could not be read, leaving ${offer.id} for the next run`);
                skipped.unknown_variants++;
                continue;
            }

            const desired = desiredStateOf(offer);
            const variant = snapshot.variants.get(key);
            if (!variant) {
                this.logger.warn(`No offer for ${article} size ${size.sizeId} (${offer.sizeLabel}), creating one`);
                tasks.push({
                    kind: 'create',
                    vendorCode: article,
                    productId,
                    barcode: offer.barcode ?? offer.id,
                    sizeId: size.sizeId,
                    price: desired.price,
                    discountPrice: desired.discountPrice,
                    quantity: desired.quantity,
                });
                requestDraft(article);
                created++;
                continue;
            }

            if (!variantMatches(variant, desired)) {
                tasks.push({
                    kind: 'update',
                    vendorCode: article,
                    productId: variant.productId,
                    barcode: variant.barcode,
                    sizeId: size.sizeId,
                    ...desired,
                });
            }
        }

        this.logger.log(
            `Planned ${tasks.length - created} updates and ${created} creates; ${used.size} offers in use, ` +
                `${moderation.size} products queued for moderation`,
        );
        return { tasks, used, moderation, draftRequests, skipped, created };
    }
}
