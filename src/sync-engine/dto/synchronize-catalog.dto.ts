import { ArrayMaxSize, IsArray, IsBoolean, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Min, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { LocalOffer } from '../sync-engine.types';

export class LocalOfferDto {
    @IsString()
    @IsNotEmpty()
    id!: string;

    // Offers without an article are accepted and skipped by the planner
    @IsOptional()
    @IsString()
    article?: string | null;

    @IsString()
    sizeLabel!: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    barcode?: string | null;

    @IsNumber({ allowNaN: false, allowInfinity: false })
    @Min(0)
    price!: number;

    @IsNumber({ allowNaN: false, allowInfinity: false })
    @Min(0)
    discountPrice!: number;

    @IsOptional()
    @IsInt()
    @Min(0)
    stockQuantity?: number | null;

    @IsBoolean()
    available!: boolean;
}

export class SynchronizeCatalogDto {
    @IsArray()
    @ArrayMaxSize(100000)
    @ValidateNested({ each: true })
    @Type(() => LocalOfferDto)
    offers!: LocalOfferDto[];
}

export function toLocalOffers(dto: SynchronizeCatalogDto): LocalOffer[] {
    return dto.offers.map((offer) => ({
        id: offer.id,
        article: offer.article ?? null,
        sizeLabel: offer.sizeLabel,
        barcode: offer.barcode ?? null,
        price: offer.price,
        discountPrice: offer.discountPrice,
        stockQuantity: offer.stockQuantity ?? null,
        available: offer.available,
    }));
}
