import type { Place } from '@tourpick/shared';

/**
 * Deduplicate by id (first occurrence wins), then keep the first `maxCount`.
 * Survivors keep their input order.
 */
export function limitResults(places: readonly Place[], maxCount: number): Place[] {
    if (maxCount <= 0) return [];

    const seen = new Set<string>();
    const result: Place[] = [];

    for (const place of places) {
        if (seen.has(place.id)) continue;
        seen.add(place.id);
        result.push(place);
        if (result.length >= maxCount) break;
    }

    return result;
}
