// Place model shared by the provider, the cache and the ranking pipeline

export interface GeoPoint {
    lat: number;
    lng: number;
}

export interface Place {
    // Core identification
    id: string; // place_id from the upstream
    name: string;
    address: string;

    location: GeoPoint;

    // Ratings & Reviews
    rating: number | null; // 0-5
    reviewCount: number;
    priceLevel: number | null; // 0-4

    types: string[]; // Upstream category tags ('restaurant', 'museum', ...)
    openNow: boolean | null;
    businessStatus: string | null;
    photos: string[]; // Photo references, not URLs

    // Contact (details lookup only)
    phone: string | null;
    website: string | null;
}

/**
 * Details lookup result. The upstream may leave out geometry, so the
 * location is null rather than a made-up point.
 */
export interface PlaceDetails extends Omit<Place, 'location'> {
    location: GeoPoint | null;
}

/**
 * Search parameters. Location may be given as an object or as a "lat,lng" string.
 */
export interface SearchParams {
    query: string;
    location?: GeoPoint | string;
    radius?: number;
    typeFilter?: string;
    language?: string;
}

export interface TextSearchRequest {
    query: string;
    location?: GeoPoint;
    radius?: number;
    type?: string;
    language?: string;
    maxResults: number;
    signal?: AbortSignal;
}

/**
 * Contract the orchestrator consumes. Implementations throw
 * QuotaExceededError or UpstreamUnavailableError on upstream failure.
 */
export interface PlacesProvider {
    readonly name: string;
    /** Results in upstream relevance order. */
    textSearch(request: TextSearchRequest): Promise<Place[]>;
    /** null when the upstream has no details for the id. */
    placeDetails(placeId: string, options?: { language?: string; signal?: AbortSignal }): Promise<PlaceDetails | null>;
}

export type TravelStyle = 'cultural' | 'adventure' | 'relaxed' | 'family' | 'business';

export type BudgetLevel = 'budget' | 'moderate' | 'luxury';

export interface UserPreferenceProfile {
    minRating: number;
    maxPriceTier: number;
    travelStyle: TravelStyle;
    categoryWeights: Readonly<Record<string, number>>;
    budget: BudgetLevel;
}

export interface ScoredPlace {
    place: Place;
    aiScore: number; // [0,1], 4 decimals
    matchReasons: string[];
}
