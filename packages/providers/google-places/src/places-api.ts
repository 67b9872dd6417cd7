import { Client, Language, PlaceData, PlaceType1 } from '@googlemaps/google-maps-services-js';
import axios from 'axios';
import {
    ApplicationError,
    CircuitBreaker,
    CircuitBreakerOptions,
    ConfigurationError,
    FailurePoint,
    GeoPoint,
    logger,
    Place,
    PlaceDetails,
    PlacesProvider,
    QuotaExceededError,
    TextSearchRequest,
    UpstreamRequestError,
    UpstreamUnavailableError,
    isAppError,
    upstreamCalls
} from '@tourpick/shared';

const SERVICE = 'google-places';
const PHOTO_BASE_URL = 'https://maps.googleapis.com/maps/api/place/photo';
const MAX_PHOTOS = 5;

const DETAIL_FIELDS = [
    'place_id', 'name', 'formatted_address', 'rating', 'user_ratings_total', 'price_level',
    'types', 'photos', 'formatted_phone_number', 'website', 'opening_hours', 'geometry', 'business_status'
];

const QUOTA_STATUSES = new Set(['OVER_QUERY_LIMIT', 'OVER_DAILY_LIMIT']);
const REJECTED_STATUSES = new Set(['REQUEST_DENIED', 'INVALID_REQUEST']);

type Operation = 'textSearch' | 'placeDetails';

export interface GooglePlacesProviderOptions {
    apiKey?: string;
    language?: string;
    timeoutMs?: number;
    circuitBreaker?: Partial<CircuitBreakerOptions>;
}

function toLanguage(value: string | undefined): Language | undefined {
    return Object.values(Language).find((language) => language === value);
}

function toPlaceType(value: string | undefined): PlaceType1 | undefined {
    return Object.values(PlaceType1).find((type) => type === value);
}

function readUpstreamStatus(body: unknown): string | undefined {
    if (typeof body === 'object' && body !== null && 'status' in body && typeof body.status === 'string') {
        return body.status;
    }
    return undefined;
}

/**
 * Thin adapter over the official Places client.
 * Upstream statuses become typed errors; no caching or retrying happens here.
 */
export class GooglePlacesProvider implements PlacesProvider {
    readonly name = SERVICE;
    private readonly client: Client;
    private readonly apiKey: string;
    private readonly language?: Language;
    private readonly timeoutMs: number;
    private readonly breaker: CircuitBreaker;

    constructor(options: GooglePlacesProviderOptions = {}) {
        this.apiKey = options.apiKey ?? process.env.GOOGLE_PLACES_API_KEY ?? '';
        this.language = toLanguage(options.language);
        this.timeoutMs = options.timeoutMs ?? 10000;

        if (!this.apiKey) {
            logger.warn('⚠️ GOOGLE_PLACES_API_KEY not configured. Places API will not work.');
        }

        this.client = new Client({});
        this.breaker = new CircuitBreaker(SERVICE, {
            failureThreshold: 5,
            cooldownMs: 30000,
            successThreshold: 2,
            // Quota and rejected requests say nothing about upstream health
            isFailure: (error) => error instanceof UpstreamUnavailableError,
            ...options.circuitBreaker
        });
        logger.info('🗺️ Google Places provider initialized');
    }

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    /**
     * Search places by text query
     */
    async textSearch(request: TextSearchRequest): Promise<Place[]> {
        const apiKey = this.requireApiKey();

        return this.call('textSearch', FailurePoint.UPSTREAM_SEARCH, async () => {
            logger.info({ query: request.query }, '🔍 Searching Google Places API');

            const response = await this.client.textSearch({
                params: {
                    query: request.query,
                    key: apiKey,
                    location: request.location,
                    radius: request.radius,
                    type: toPlaceType(request.type),
                    language: toLanguage(request.language) ?? this.language
                },
                timeout: this.timeoutMs,
                signal: request.signal
            });

            const status: string = response.data.status;
            if (status === 'ZERO_RESULTS') {
                return [];
            }
            if (status !== 'OK') {
                throw this.statusError(status, FailurePoint.UPSTREAM_SEARCH, response.data.error_message);
            }

            const places = response.data.results
                .map((place) => this.mapPlace(place))
                .filter((place): place is Place => place !== null && place.location !== null)
                .slice(0, request.maxResults);

            logger.info({ count: places.length }, '✅ Places API search complete');
            return places;
        });
    }

    /**
     * Get detailed information for a specific place
     */
    async placeDetails(placeId: string, options: { language?: string; signal?: AbortSignal } = {}): Promise<PlaceDetails | null> {
        const apiKey = this.requireApiKey();

        return this.call('placeDetails', FailurePoint.UPSTREAM_DETAILS, async () => {
            const response = await this.client.placeDetails({
                params: {
                    place_id: placeId,
                    fields: DETAIL_FIELDS,
                    key: apiKey,
                    language: toLanguage(options.language) ?? this.language
                },
                timeout: this.timeoutMs,
                signal: options.signal
            });

            const status: string = response.data.status;
            if (status === 'NOT_FOUND' || status === 'ZERO_RESULTS') {
                return null;
            }
            if (status !== 'OK') {
                throw this.statusError(status, FailurePoint.UPSTREAM_DETAILS, response.data.error_message);
            }

            return this.mapPlace({ place_id: placeId, ...response.data.result });
        });
    }

    /**
     * Photo URL for a stored photo reference. Carries the API key, so never cache or log it.
     */
    photoUrl(photoReference: string, maxWidth: number = 400, maxHeight: number = 400): string {
        if (!photoReference) return '';

        const params = new URLSearchParams({
            photo_reference: photoReference,
            maxwidth: String(maxWidth),
            maxheight: String(maxHeight),
            key: this.apiKey
        });
        return `${PHOTO_BASE_URL}?${params.toString()}`;
    }

    private requireApiKey(): string {
        if (!this.apiKey) {
            throw new ConfigurationError('GOOGLE_PLACES_API_KEY is not configured', { service: SERVICE });
        }
        return this.apiKey;
    }

    private async call<T>(operation: Operation, failurePoint: FailurePoint, fn: () => Promise<T>): Promise<T> {
        try {
            const result = await this.breaker.execute(async () => {
                try {
                    return await fn();
                } catch (error) {
                    throw this.classifyError(error, failurePoint);
                }
            });
            upstreamCalls.inc({ operation, outcome: 'success' });
            return result;
        } catch (error) {
            upstreamCalls.inc({ operation, outcome: this.outcomeOf(error) });
            throw error;
        }
    }

    private statusError(status: string, failurePoint: FailurePoint, message?: string): ApplicationError {
        const context = message ? { upstreamMessage: message } : undefined;

        if (QUOTA_STATUSES.has(status)) {
            return new QuotaExceededError(SERVICE, status, context, failurePoint);
        }
        if (REJECTED_STATUSES.has(status)) {
            return new UpstreamRequestError(SERVICE, status, context, failurePoint);
        }
        // UNKNOWN_ERROR and anything undocumented: the upstream says try again
        return new UpstreamUnavailableError(SERVICE, status, context, failurePoint);
    }

    private classifyError(error: unknown, failurePoint: FailurePoint): unknown {
        if (isAppError(error) || axios.isCancel(error)) {
            return error;
        }

        if (axios.isAxiosError(error)) {
            const httpStatus = error.response?.status;
            const upstreamStatus = readUpstreamStatus(error.response?.data);

            if (upstreamStatus && upstreamStatus !== 'OK') {
                return this.statusError(upstreamStatus, failurePoint);
            }
            if (httpStatus === 429) {
                return new QuotaExceededError(SERVICE, 'HTTP 429', undefined, failurePoint);
            }
            if (httpStatus !== undefined && httpStatus >= 400 && httpStatus < 500) {
                return new UpstreamRequestError(SERVICE, `HTTP ${httpStatus}`, undefined, failurePoint);
            }
            const reason = httpStatus !== undefined ? `HTTP ${httpStatus}` : (error.code ?? error.message);
            return new UpstreamUnavailableError(SERVICE, reason, undefined, failurePoint);
        }

        const reason = error instanceof Error ? error.message : String(error);
        return new UpstreamUnavailableError(SERVICE, reason, undefined, failurePoint);
    }

    private outcomeOf(error: unknown): string {
        if (error instanceof QuotaExceededError) return 'quota';
        if (error instanceof UpstreamUnavailableError) return 'unavailable';
        if (error instanceof UpstreamRequestError) return 'rejected';
        return 'error';
    }

    /**
     * Map upstream place data. Results without an id are dropped; a missing
     * geometry maps to a null location.
     */
    private mapPlace(place: Partial<PlaceData>): PlaceDetails | null {
        if (!place.place_id) {
            return null;
        }

        const location: GeoPoint | null = place.geometry?.location
            ? { lat: place.geometry.location.lat, lng: place.geometry.location.lng }
            : null;

        return {
            id: place.place_id,
            name: place.name ?? '',
            address: place.formatted_address ?? place.vicinity ?? '',
            location,
            rating: place.rating ?? null,
            reviewCount: place.user_ratings_total ?? 0,
            priceLevel: place.price_level ?? null,
            types: place.types ? [...place.types] : [],
            openNow: place.opening_hours?.open_now ?? null,
            businessStatus: place.business_status ?? null,
            photos: (place.photos ?? []).slice(0, MAX_PHOTOS).map((photo) => photo.photo_reference),
            phone: place.formatted_phone_number ?? null,
            website: place.website ?? null
        };
    }
}
