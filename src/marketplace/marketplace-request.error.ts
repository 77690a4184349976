import { HttpMethod } from './marketplace.types';

/**
 * Raised by the persistent transport once its retry rounds are used up.
 */
export class MarketplaceRequestError extends Error {
    constructor(
        readonly method: HttpMethod,
        readonly path: string,
        readonly status: number | null,
        readonly attempts: number,
        cause?: unknown,
    ) {
        super(
            `${method} ${path} failed after ${attempts} attempts` + (status !== null ? ` (last status ${status})` : ''),
            { cause },
        );
        this.name = 'MarketplaceRequestError';
    }
}
