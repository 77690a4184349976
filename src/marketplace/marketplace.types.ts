// --- Wire shapes of the marketplace REST API ---

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT';

export interface MarketplaceMoney {
    amount: number;
    currency: string;
}

// Every list endpoint wraps its payload as { data: { items: [...] } }
export interface MarketplaceListResponse<T> {
    data?: {
        items?: T[];
    };
}

export interface MarketplaceProductItem {
    article?: string | null; // remote product id, used in URLs
    vendor_code?: string | null; // the seller's article
    status?: { code?: string | null } | null;
}

export interface MarketplaceOfferItem {
    barcode?: string | null;
    size_id?: number | string | null;
    base_price?: number | string | null;
    discount_price?: number | string | null;
    active?: boolean | null;
    quantity?: number | string | null;
}

export interface MarketplaceAuthResponse {
    data?: {
        access_token?: {
            token?: unknown;
            expires_date?: unknown;
        };
    };
}

export interface UpdateOfferPayload {
    base_price: MarketplaceMoney;
    discount_price: MarketplaceMoney;
    active: boolean;
    quantity: number;
}

export interface CreateOfferPayload {
    barcode: string;
    active: boolean;
    base_price: MarketplaceMoney;
    discount_price: MarketplaceMoney;
    quantity: number;
    size_id: number;
}

export interface UpdateProductPricesPayload {
    active: boolean;
    base_price: MarketplaceMoney;
    discount_price: MarketplaceMoney;
}

export interface ChangeProductStatusPayload {
    status: string;
}

export type MarketplaceRequestBody =
    | UpdateOfferPayload
    | CreateOfferPayload
    | UpdateProductPricesPayload
    | ChangeProductStatusPayload
    | { app_key: string; app_secret: string };

export interface MarketplaceRequestOptions {
    token?: string | null;
    query?: Record<string, string | number>;
    body?: MarketplaceRequestBody;
}

/** A successful call. `data` is null when the marketplace answered without a body. */
export interface MarketplaceResponse<T> {
    status: number;
    data: T | null;
}
