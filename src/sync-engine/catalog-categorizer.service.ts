import { Injectable, Logger } from '@nestjs/common';
import { isStableStatus } from './remote-status';
import { CatalogCategories, RemoteProduct } from './sync-engine.types';

@Injectable()
export class CatalogCategorizer {
    private readonly logger = new Logger(CatalogCategorizer.name);

    /**
     * Splits both article sets into remote-only, local-only and matched, and buckets
     * the remote statuses. The status buckets other than `notUploaded` only hold
     * matched articles.
     */
    categorize(products: readonly RemoteProduct[], localArticles: Iterable<string>): CatalogCategories {
        const articleToId = new Map<string, string>();
        const statusOf = new Map<string, RemoteProduct['status']>();
        for (const product of products) {
            articleToId.set(product.vendorCode, product.productId);
            statusOf.set(product.vendorCode, product.status);
        }
        const local = new Set(localArticles);

        const notUploaded = new Set<string>();
        const draftList = new Set<string>();
        const moderateArticles = new Set<string>();
        const notApprovedArticles = new Set<string>();
        const remoteOnly = new Set<string>();
        const matched = new Set<string>();

        for (const [article, status] of statusOf) {
            if (!isStableStatus(status)) {
                notUploaded.add(article);
            }
            if (!local.has(article)) {
                remoteOnly.add(article);
                continue;
            }
            matched.add(article);
            if (status.kind === 'draft') {
                draftList.add(article);
            } else if (status.kind === 'moderate') {
                moderateArticles.add(article);
            } else if (status.kind === 'not_approved') {
                notApprovedArticles.add(article);
                this.logger.warn(`Product ${article} was not approved by moderation and needs manual attention`);
            }
        }

        const localOnly = new Set([...local].filter((article) => !articleToId.has(article)));

        this.logger.log(
            `Categorized catalog: matched=${matched.size} remoteOnly=${remoteOnly.size} localOnly=${localOnly.size} ` +
                `notUploaded=${notUploaded.size} draft=${draftList.size} moderate=${moderateArticles.size} notApproved=${notApprovedArticles.size}`,
        );

        return { articleToId, notUploaded, draftList, moderateArticles, notApprovedArticles, remoteOnly, localOnly, matched };
    }
}
