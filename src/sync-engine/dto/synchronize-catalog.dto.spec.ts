import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { SynchronizeCatalogDto, toLocalOffers } from './synchronize-catalog.dto';

function validate(body: unknown): { dto: SynchronizeCatalogDto; errors: string[] } {
    const dto = plainToInstance(SynchronizeCatalogDto, body);
    const errors = validateSync(dto).flatMap((error) =>
        (error.children ?? []).flatMap((offer) => (offer.children ?? []).map((field) => `${offer.property}.${field.property}`)),
    );
    return { dto, errors };
}

describe('SynchronizeCatalogDto', () => {
    it('accepts offers and fills absent optional fields with null', () => {
        const { dto, errors } = validate({
            offers: [
                { id: 'o-1', article: 'A-1', sizeLabel: 'M', barcode: '4820000000011', price: 1299.5, discountPrice: 999, stockQuantity: 3, available: true },
                { id: 'o-2', sizeLabel: '42', price: 10, discountPrice: 10, available: false },
            ],
        });

        expect(errors).toEqual([]);
        expect(toLocalOffers(dto)).toEqual([
            { id: 'o-1', article: 'A-1', sizeLabel: 'M', barcode: '4820000000011', price: 1299.5, discountPrice: 999, stockQuantity: 3, available: true },
            { id: 'o-2', article: null, sizeLabel: '42', barcode: null, price: 10, discountPrice: 10, stockQuantity: null, available: false },
        ]);
    });

    it('reports the invalid fields of each offer', () => {
        const { errors } = validate({
            offers: [
                { id: '', sizeLabel: 'M', price: -1, discountPrice: 5, stockQuantity: 1.5, available: 'yes' },
            ],
        });

        expect(errors).toEqual(['0.id', '0.price', '0.stockQuantity', '0.available']);
    });

    it('requires an offers array', () => {
        const dto = plainToInstance(SynchronizeCatalogDto, { offers: 'none' });

        expect(validateSync(dto).map((error) => error.property)).toEqual(['offers']);
    });
});
