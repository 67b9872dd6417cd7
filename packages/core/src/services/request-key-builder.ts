import { createHash } from 'crypto';
import { GeoPoint, SearchParams, ValidationError } from '@tourpick/shared';

const COORDINATE_DECIMALS = 4; // ~11 m

export function normalizeQuery(query: string): string {
    return query.normalize('NFC').trim().toLowerCase().replace(/\s+/g, ' ');
}

function roundCoordinate(value: number): number {
    const factor = Math.pow(10, COORDINATE_DECIMALS);
    const rounded = Math.round(value * factor) / factor;
    // -0 and 0 must produce the same key
    return rounded === 0 ? 0 : rounded;
}

/**
 * Accepts `{ lat, lng }` or a "lat,lng" string.
 */
export function parseLocation(location: GeoPoint | string): GeoPoint {
    if (typeof location !== 'string') {
        return { lat: location.lat, lng: location.lng };
    }

    const parts = location.split(',').map((part) => part.trim());
    const lat = Number(parts[0]);
    const lng = Number(parts[1]);
    if (parts.length !== 2 || parts[0] === '' || parts[1] === '' || !Number.isFinite(lat) || !Number.isFinite(lng)) {
        throw new ValidationError(`Invalid location "${location}", expected "lat,lng"`, [
            { field: 'location', message: 'expected "lat,lng"' }
        ]);
    }
    return { lat, lng };
}

/**
 * Canonical form of search params. Field order is fixed here, so the
 * caller's property order never reaches the key.
 */
export function canonicalize(params: SearchParams): string {
    const location = params.location !== undefined ? parseLocation(params.location) : undefined;

    const canonical = [
        `q=${normalizeQuery(params.query)}`,
        `loc=${location ? `${roundCoordinate(location.lat)},${roundCoordinate(location.lng)}` : ''}`,
        `r=${params.radius ?? ''}`,
        `type=${params.typeFilter?.trim() ?? ''}`,
        `lang=${params.language?.trim().toLowerCase() ?? ''}`,
    ];
    return canonical.join('|');
}

/**
 * Stable cache key for a search. Logically identical requests map to the same key.
 */
export function buildCacheKey(params: SearchParams): string {
    return createHash('sha256').update(canonicalize(params), 'utf8').digest('hex');
}

/**
 * Key for one place's details. Details depend on the id and the language only,
 * so every search that returns the place shares it.
 */
export function buildDetailsCacheKey(placeId: string, language?: string): string {
    const canonical = `details|id=${placeId}|lang=${language?.trim().toLowerCase() ?? ''}`;
    return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

export const RequestKeyBuilder = {
    build: buildCacheKey,
    buildDetails: buildDetailsCacheKey,
    canonicalize,
} as const;
