/**
 * ClinVar review status -> star rating (0-4).
 */

export type StarRating = 0 | 1 | 2 | 3 | 4;

export type ReviewStatusTable = ReadonlyMap<string, StarRating>;

export const DEFAULT_REVIEW_STATUS_STARS: ReviewStatusTable = new Map<string, StarRating>([
    ['practice guideline', 4],
    ['reviewed by expert panel', 3],
    ['criteria provided, multiple submitters, no conflicts', 2],
    ['criteria provided, single submitter', 1],
    ['no assertion criteria provided', 0],
    ['no classification provided', 0],
]);

/**
 * Looks the trimmed, lower-cased text up in `table` first. Failing an exact
 * match, substring tiers are tried in order so that punctuation or wording
 * drift in the summary text still lands on a rating. Unrecognised text
 * gives null.
 */
export function deriveStarRating(
    reviewStatus: string | null | undefined,
    table: ReviewStatusTable = DEFAULT_REVIEW_STATUS_STARS
): StarRating | null {
    if (typeof reviewStatus !== 'string') return null;

    const normalized = reviewStatus.trim().toLowerCase();
    const exact = table.get(normalized);
    if (exact !== undefined) return exact;

    if (normalized.includes('practice guideline')) return 4;
    if (normalized.includes('expert panel')) return 3;
    if (normalized.includes('multiple submitters') && normalized.includes('no conflicts')) return 2;
    if (normalized.includes('criteria provided') && normalized.includes('single submitter')) return 1;
    if (normalized.includes('no assertion criteria provided') || normalized.includes('no classification provided')) {
        return 0;
    }
    return null;
}
