import { RemoteStatus } from './remote-status';

// --- Local catalog ---

export interface LocalOffer {
    id: string;
    article: string | null; // offers without an article never reach the marketplace
    sizeLabel: string;
    barcode: string | null;
    price: number;
    discountPrice: number;
    stockQuantity: number | null;
    available: boolean;
}

// --- Remote snapshot ---

export interface RemoteProduct {
    vendorCode: string;
    productId: string;
    status: RemoteStatus;
}

export interface RemoteVariant {
    vendorCode: string;
    productId: string;
    sizeId: number;
    barcode: string;
    basePrice: number;
    discountPrice: number;
    active: boolean;
    quantity: number;
    status: RemoteStatus;
}

export type VariantKey = `${string}::${number}`;

export function variantKey(vendorCode: string, sizeId: number): VariantKey {
    return `${vendorCode}::${sizeId}`;
}

export type VariantSnapshot = ReadonlyMap<VariantKey, RemoteVariant>;

export interface RemoteOfferSnapshot {
    variants: VariantSnapshot;
    unreadable: ReadonlySet<string>; // vendor codes whose offer listing could not be read
}

export interface CatalogCategories {
    articleToId: ReadonlyMap<string, string>;
    notUploaded: ReadonlySet<string>;
    draftList: ReadonlySet<string>;
    moderateArticles: ReadonlySet<string>;
    notApprovedArticles: ReadonlySet<string>;
    remoteOnly: ReadonlySet<string>;
    localOnly: ReadonlySet<string>;
    matched: ReadonlySet<string>;
}

// --- Planned operations ---

export type TargetStatus = 'draft' | 'moderate';

export interface UpdateVariantTask {
    kind: 'update';
    vendorCode: string;
    productId: string;
    barcode: string;
    sizeId: number;
    price: number;
    discountPrice: number;
    quantity: number;
    active: boolean;
}

export interface CreateVariantTask {
    kind: 'create';
    vendorCode: string;
    productId: string;
    barcode: string;
    sizeId: number;
    price: number;
    discountPrice: number;
    quantity: number;
}

export interface DeactivateVariantTask {
    kind: 'deactivate';
    vendorCode: string;
    productId: string;
    barcode: string;
    sizeId: number;
    price: number;
    discountPrice: number;
}

export interface SetStatusTask {
    kind: 'setStatus';
    vendorCode: string;
    productId: string;
    status: TargetStatus;
}

export type SyncTask = UpdateVariantTask | CreateVariantTask | DeactivateVariantTask | SetStatusTask;

export interface TaskOutcome<T extends SyncTask = SyncTask> {
    task: T;
    status: 'applied' | 'failed';
    error?: string;
}

export type SkipReason = 'missing_article' | 'local_only' | 'unmapped_size' | 'duplicate_variant' | 'unknown_variants';

export interface OfferPlan {
    tasks: Array<UpdateVariantTask | CreateVariantTask>;
    used: ReadonlySet<VariantKey>;
    moderation: ReadonlySet<string>;
    draftRequests: ReadonlySet<string>;
    skipped: Readonly<Record<SkipReason, number>>;
    created: number;
}

export interface StatusPrePass {
    tasks: SetStatusTask[];
    pendingModeration: ReadonlySet<string>;
    drafted: ReadonlySet<string>;
}

// --- Run results ---

export interface OutcomeCounts {
    applied: number;
    failed: number;
}

export interface SyncReport {
    startedAt: string;
    finishedAt: string;
    authenticated: boolean;
    remoteProducts: number;
    remoteVariants: number;
    localOffers: number;
    categories: {
        matched: number;
        remoteOnly: number;
        localOnly: number;
        notUploaded: number;
        notApproved: number;
    };
    planned: {
        updates: number;
        creates: number;
        deactivations: number;
    };
    skipped: Readonly<Record<SkipReason, number>>;
    statusChanges: {
        drafted: OutcomeCounts;
        restored: OutcomeCounts;
    };
    offerWrites: OutcomeCounts;
    deactivations: OutcomeCounts;
}

export interface PriceRefreshReport {
    startedAt: string;
    finishedAt: string;
    authenticated: boolean;
    updated: number;
    failed: number;
    unmatched: string[];
}
