import type { GroupKind } from '@dirshelf/types';

/**
 * How the current source's records are shown.
 *
 * In grouped mode `bucketIndex` selects one bucket of the categorized list.
 */
export type ViewMode =
    | { kind: 'flat' }
    | { kind: 'grouped'; by: GroupKind; bucketIndex: number };

export const FLAT_VIEW: ViewMode = { kind: 'flat' };
