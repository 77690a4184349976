export const KNOWN_STATUS_CODES = ['uploaded', 'draft', 'moderate', 'approved', 'not_approved'] as const;

export type KnownStatusCode = (typeof KNOWN_STATUS_CODES)[number];

/**
 * Remote product status. Codes the marketplace may add later land in `other`
 * and are treated as not ready for offer edits.
 */
export type RemoteStatus =
    | { kind: KnownStatusCode }
    | { kind: 'other'; code: string | null };

// Statuses whose offers are live or under review and are safe to reconcile.
const STABLE_KINDS: ReadonlySet<RemoteStatus['kind']> = new Set(['uploaded', 'moderate', 'approved', 'not_approved']);

export function parseRemoteStatus(code: unknown): RemoteStatus {
    const known = KNOWN_STATUS_CODES.find((candidate) => candidate === code);
    if (known) {
        return { kind: known };
    }
    return { kind: 'other', code: typeof code === 'string' ? code : null };
}

export function isStableStatus(status: RemoteStatus): boolean {
    return STABLE_KINDS.has(status.kind);
}

export function describeStatus(status: RemoteStatus): string {
    return status.kind === 'other' ? `other(${status.code ?? 'none'})` : status.kind;
}
