import { InMemoryMarketplace, offer } from '../marketplace/testing/in-memory-marketplace';
import { SyncCoordinatorService } from './sync-coordinator.service';
import { LocalOffer } from './sync-engine.types';
import { createSyncEngine } from './testing/sync-engine.fixture';

function localOffer(id: string, article: string | null, sizeLabel: string, overrides: Partial<LocalOffer> = {}): LocalOffer {
    return { id, article, sizeLabel, barcode: null, price: 1000, discountPrice: 900, stockQuantity: 3, available: true, ...overrides };
}

describe('SyncCoordinatorService', () => {
    let marketplace: InMemoryMarketplace;
    let coordinator: SyncCoordinatorService;
    const credentials = { appKey: 'test-key', appSecret: 'test-secret' };

    const catalog: LocalOffer[] = [
        localOffer('o1', 'A-LIVE', 'M'),
        localOffer('o2', 'A-LIVE', 'L', { stockQuantity: 5 }),
        localOffer('o3', 'A-MOD', 'M', { price: 550, discountPrice: 450, stockQuantity: 1 }),
        localOffer('o4', 'A-NEW', 'S', { barcode: '4820000000028', price: 700, discountPrice: 650, stockQuantity: 2 }),
        localOffer('o5', 'A-LOCAL', 'M'),
        localOffer('o6', null, 'M'),
    ];

    beforeEach(() => {
        marketplace = new InMemoryMarketplace();
        marketplace.addProduct('A-LIVE', 'P-LIVE', 'uploaded', [
            offer('b-live-m', 103, 1000, 900, 3),
            offer('b-live-l', 104, 1000, 900, 2),
            offer('b-live-s', 102, 1000, 900, 4),
        ]);
        marketplace.addProduct('A-MOD', 'P-MOD', 'moderate', [offer('b-mod-m', 103, 500, 450, 1), offer('b-mod-l', 104, 500, 450, 1)]);
        marketplace.addProduct('A-STALE', 'P-STALE', 'approved', [offer('b-stale', 103, 300, 300, 1)]);
        marketplace.addProduct('A-NEW', 'P-NEW', 'draft');

        coordinator = createSyncEngine(marketplace).coordinator;
    });

    it('reconciles the marketplace with the local catalog', async () => {
        const report = await coordinator.synchronize(catalog, credentials);

        expect(marketplace.product('A-LIVE')?.offers).toEqual([
            offer('b-live-m', 103, 1000, 900, 3),
            offer('b-live-l', 104, 1000, 900, 5),
            offer('b-live-s', 102, 1000, 900, 0, false),
        ]);
        expect(marketplace.product('A-MOD')?.offers).toEqual([offer('b-mod-m', 103, 550, 450, 1), offer('b-mod-l', 104, 500, 450, 1)]);
        expect(marketplace.product('A-STALE')?.offers).toEqual([offer('b-stale', 103, 300, 300, 1)]);
        expect(marketplace.product('A-NEW')?.offers).toEqual([offer('4820000000028', 102, 700, 650, 2)]);

        expect(marketplace.product('A-MOD')?.status).toBe('moderate');
        expect(marketplace.product('A-STALE')?.status).toBe('draft');
        expect(marketplace.product('A-NEW')?.status).toBe('moderate');
        expect(marketplace.writes().filter((call) => call.path.endsWith('/status')).map((call) => [call.path, call.body])).toEqual([
            ['products/P-STALE/status', { status: 'draft' }],
            ['products/P-MOD/status', { status: 'draft' }],
            ['products/P-MOD/status', { status: 'moderate' }],
            ['products/P-NEW/status', { status: 'moderate' }],
        ]);

        expect(report).toMatchObject({
            authenticated: true,
            remoteProducts: 4,
            remoteVariants: 6,
            localOffers: 6,
            categories: { matched: 3, remoteOnly: 1, localOnly: 1, notUploaded: 1, notApproved: 0 },
            planned: { updates: 2, creates: 1, deactivations: 1 },
            skipped: { missing_article: 1, local_only: 1, unmapped_size: 0, duplicate_variant: 0, unknown_variants: 0 },
            statusChanges: { drafted: { applied: 2, failed: 0 }, restored: { applied: 2, failed: 0 } },
            offerWrites: { applied: 3, failed: 0 },
            deactivations: { applied: 1, failed: 0 },
        });
    });

    it('writes no offers on a second run over the same catalog', async () => {
        await coordinator.synchronize(catalog, credentials);
        marketplace.calls.length = 0;

        const report = await coordinator.synchronize(catalog, credentials);

        expect(report.planned).toEqual({ updates: 0, creates: 0, deactivations: 0 });
        expect(marketplace.writes().filter((call) => call.path.includes('/offers'))).toEqual([]);
    });

    it('keeps going after an offer write gives up', async () => {
        marketplace.script('PATCH', 'products/P-LIVE/offers/b-live-l', { status: 500 }, { status: 500 }, { status: 500 });

        const report = await coordinator.synchronize(catalog, credentials);

        expect(report.offerWrites).toEqual({ applied: 2, failed: 1 });
        expect(report.deactivations).toEqual({ applied: 1, failed: 0 });
        expect(report.statusChanges.restored).toEqual({ applied: 2, failed: 0 });
        expect(marketplace.product('A-LIVE')?.offers[1]).toEqual(offer('b-live-l', 104, 1000, 900, 2));
    });

    it('leaves a product alone when its offers cannot be read', async () => {
        const live = new InMemoryMarketplace();
        live.addProduct('A-LIVE', 'P-LIVE', 'uploaded', [offer('b-live-m', 103, 1000, 900, 3)]);
        live.script('GET', 'products/P-LIVE/offers', { status: 500 }, { status: 500 }, { status: 500 });

        const report = await createSyncEngine(live).coordinator.synchronize([localOffer('o1', 'A-LIVE', 'M', { stockQuantity: 7 })], credentials);

        expect(live.writes()).toEqual([]);
        expect(live.product('A-LIVE')?.offers).toEqual([offer('b-live-m', 103, 1000, 900, 3)]);
        expect(live.product('A-LIVE')?.status).toBe('uploaded');
        expect(report.remoteVariants).toBe(0);
        expect(report.planned).toEqual({ updates: 0, creates: 0, deactivations: 0 });
        expect(report.skipped.unknown_variants).toBe(1);
    });

    it('runs unauthenticated and changes nothing when the credentials are rejected', async () => {
        const report = await coordinator.synchronize(catalog, { appKey: 'test-key', appSecret: 'wrong-secret' });

        expect(report.authenticated).toBe(false);
        expect(report.remoteProducts).toBe(0);
        expect(report.skipped).toEqual({ missing_article: 1, local_only: 5, unmapped_size: 0, duplicate_variant: 0, unknown_variants: 0 });
        expect(marketplace.writes()).toEqual([]);
        expect(marketplace.product('A-MOD')?.status).toBe('moderate');
    });
});
