import { MarketplaceApiClient } from './marketplace-api.client';
import { MarketplaceMapper } from './marketplace.mapper';
import { MarketplaceSettings } from './marketplace.settings';
import { InMemoryMarketplace, TEST_SETTINGS, offer } from './testing/in-memory-marketplace';
import { RemoteProduct, variantKey } from '../sync-engine/sync-engine.types';

describe('MarketplaceApiClient', () => {
    let marketplace: InMemoryMarketplace;

    function createClient(settings: MarketplaceSettings = TEST_SETTINGS): MarketplaceApiClient {
        return new MarketplaceApiClient(marketplace.createHttpClient(settings), new MarketplaceMapper(), settings);
    }

    function remote(vendorCode: string, productId: string): RemoteProduct {
        return { vendorCode, productId, status: { kind: 'uploaded' } };
    }

    beforeEach(() => {
        marketplace = new InMemoryMarketplace();
    });

    describe('fetchAllProducts', () => {
        it('walks every page until an empty one', async () => {
            for (let i = 0; i < 737; i++) {
                marketplace.addProduct(`A-${i}`, `P-${i}`, 'uploaded');
            }

            const products = await createClient().fetchAllProducts(marketplace.token);

            expect(products).toHaveLength(737);
            expect(products[736]).toEqual({ vendorCode: 'A-736', productId: 'P-736', status: { kind: 'uploaded' } });
            expect(marketplace.callsTo('GET', 'products').map((call) => call.query)).toEqual([
                { limit: 300, offset: 0 },
                { limit: 300, offset: 300 },
                { limit: 300, offset: 600 },
                { limit: 300, offset: 900 },
            ]);
        });

        it('makes a single call for an empty catalog', async () => {
            await expect(createClient().fetchAllProducts(marketplace.token)).resolves.toEqual([]);
            expect(marketplace.calls).toHaveLength(1);
        });

        it('returns what it has when a page cannot be fetched', async () => {
            marketplace.script(
                'GET',
                'products',
                { status: 200, body: { data: { items: [{ article: 'P-1', vendor_code: 'A-1', status: { code: 'draft' } }] } } },
                { status: 500 },
                { status: 500 },
                { status: 500 },
            );

            const products = await createClient().fetchAllProducts(marketplace.token);

            expect(products).toEqual([{ vendorCode: 'A-1', productId: 'P-1', status: { kind: 'draft' } }]);
            expect(marketplace.calls).toHaveLength(4);
        });
    });

    describe('fetchVariantSnapshot', () => {
        it('keys offers by vendor code and size id with bounded fan-out', async () => {
            const products: RemoteProduct[] = [];
            for (let i = 0; i < 25; i++) {
                marketplace.addProduct(`A-${i}`, `P-${i}`, 'uploaded', [offer(`b-${i}`, 103, 100, 90, 1)]);
                products.push(remote(`A-${i}`, `P-${i}`));
            }

            const snapshot = await createClient().fetchVariantSnapshot(marketplace.token, products);

            expect(snapshot.variants.size).toBe(25);
            expect(snapshot.variants.get(variantKey('A-7', 103))?.barcode).toBe('b-7');
            expect(snapshot.unreadable.size).toBe(0);
            expect(marketplace.maxInFlight).toBeLessThanOrEqual(10);
            expect(marketplace.maxInFlight).toBeGreaterThan(1);
        });

        it('lets the later of two offers with the same size win', async () => {
            marketplace.addProduct('A-1', 'P-1', 'uploaded', [offer('111', 103, 100, 90, 1), offer('222', 103, 100, 90, 1)]);

            const snapshot = await createClient().fetchVariantSnapshot(marketplace.token, [remote('A-1', 'P-1')]);

            expect(snapshot.variants.size).toBe(1);
            expect(snapshot.variants.get(variantKey('A-1', 103))?.barcode).toBe('222');
        });

        it('reports products whose listing is missing or keeps failing', async () => {
            marketplace.addProduct('A-1', 'P-1', 'uploaded', [offer('111', 103, 100, 90, 1)]);
            marketplace.addProduct('A-2', 'P-2', 'uploaded', [offer('222', 104, 100, 90, 1)]);
            marketplace.script('GET', 'products/P-2/offers', { status: 500 }, { status: 500 }, { status: 500 });

            const snapshot = await createClient().fetchVariantSnapshot(marketplace.token, [
                remote('A-1', 'P-1'),
                remote('A-2', 'P-2'),
                remote('A-3', 'P-3'),
            ]);

            expect([...snapshot.variants.keys()]).toEqual(['A-1::103']);
            expect([...snapshot.unreadable]).toEqual(['A-2', 'A-3']);
        });
    });

    describe('writes', () => {
        beforeEach(() => {
            marketplace.addProduct('A-1', 'P-1', 'draft', [offer('111', 103, 100, 90, 1)]);
        });

        it('updates an offer by barcode', async () => {
            const applied = await createClient().updateOffer(marketplace.token, {
                kind: 'update',
                vendorCode: 'A-1',
                productId: 'P-1',
                barcode: '111',
                sizeId: 103,
                price: 120,
                discountPrice: 99.9,
                quantity: 5,
                active: true,
            });

            expect(applied).toBe(true);
            expect(marketplace.product('A-1')?.offers).toEqual([offer('111', 103, 120, 99.9, 5)]);
        });

        it('reports an update of an unknown barcode as not applied', async () => {
            const applied = await createClient().updateOffer(marketplace.token, {
                kind: 'deactivate',
                vendorCode: 'A-1',
                productId: 'P-1',
                barcode: '999',
                sizeId: 104,
                price: 100,
                discountPrice: 90,
            });

            expect(applied).toBe(false);
        });

        it('creates an offer', async () => {
            await createClient().createOffer(marketplace.token, {
                kind: 'create',
                vendorCode: 'A-1',
                productId: 'P-1',
                barcode: '333',
                sizeId: 105,
                price: 200,
                discountPrice: 180,
                quantity: 3,
            });

            expect(marketplace.product('A-1')?.offers[1]).toEqual(offer('333', 105, 200, 180, 3));
        });

        it('changes the product status', async () => {
            await expect(createClient().changeProductStatus(marketplace.token, 'P-1', 'moderate')).resolves.toBe(true);
            expect(marketplace.product('A-1')?.status).toBe('moderate');
            expect(marketplace.callsTo('PUT', 'products/P-1/status')[0].body).toEqual({ status: 'moderate' });
        });

        it('reports a status change as failed after the bounded retries', async () => {
            marketplace.script('PUT', 'products/P-1/status', { status: 500 }, { status: 500 }, { status: 500 });

            await expect(createClient().changeProductStatus(marketplace.token, 'P-1', 'draft')).resolves.toBe(false);
            expect(marketplace.product('A-1')?.status).toBe('draft');
        });

        it('refreshes product-level prices', async () => {
            const applied = await createClient().updateProductPrices(marketplace.token, 'P-1', {
                id: 'o-1',
                article: 'A-1',
                sizeLabel: 'M',
                barcode: null,
                price: 150,
                discountPrice: 140,
                stockQuantity: 2,
                available: true,
            });

            expect(applied).toBe(true);
            expect(marketplace.callsTo('PATCH', 'products/P-1/offers/prices')[0].body).toEqual({
                active: true,
                base_price: { amount: 150, currency: 'UAH' },
                discount_price: { amount: 140, currency: 'UAH' },
            });
        });
    });
});
