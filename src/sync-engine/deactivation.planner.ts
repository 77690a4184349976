import { Injectable, Logger } from '@nestjs/common';
import { describeStatus, isStableStatus } from './remote-status';
import { DeactivateVariantTask, VariantKey, VariantSnapshot } from './sync-engine.types';

@Injectable()
export class DeactivationPlanner {
    private readonly logger = new Logger(DeactivationPlanner.name);

    /**
     * Every live variant no local offer claimed is switched off: quantity 0, inactive,
     * prices as they are. Only products in a stable status are touched.
     */
    plan(snapshot: VariantSnapshot, used: ReadonlySet<VariantKey>): DeactivateVariantTask[] {
        const tasks: DeactivateVariantTask[] = [];
        let notReady = 0;

        for (const [key, variant] of snapshot) {
            if (used.has(key) || !variant.active) {
                continue;
            }
            if (!isStableStatus(variant.status)) {
                this.logger.debug(`Leaving ${key} alone, product status is ${describeStatus(variant.status)}`);
                notReady++;
                continue;
            }
            tasks.push({
                kind: 'deactivate',
                vendorCode: variant.vendorCode,
                productId: variant.productId,
                barcode: variant.barcode,
                sizeId: variant.sizeId,
                price: variant.basePrice,
                discountPrice: variant.discountPrice,
            });
        }

        this.logger.log(`Planned ${tasks.length} deactivations (${notReady} unused offers on products not ready)`);
        return tasks;
    }
}
