import { GeoPoint, NotFoundError } from '@tourpick/shared';

// Known destinations and tourism categories

export interface City {
    key: string;
    name: string;
    location: GeoPoint;
}

export const CITIES: Readonly<Record<string, City>> = Object.freeze({
    bogota: { key: 'bogota', name: 'Bogotá', location: { lat: 4.6097, lng: -74.0817 } },
    medellin: { key: 'medellin', name: 'Medellín', location: { lat: 6.2442, lng: -75.5812 } },
    cali: { key: 'cali', name: 'Cali', location: { lat: 3.4516, lng: -76.532 } },
    cartagena: { key: 'cartagena', name: 'Cartagena', location: { lat: 10.391, lng: -75.4794 } },
    barranquilla: { key: 'barranquilla', name: 'Barranquilla', location: { lat: 10.9685, lng: -74.7813 } },
    bucaramanga: { key: 'bucaramanga', name: 'Bucaramanga', location: { lat: 7.1193, lng: -73.1227 } },
    pereira: { key: 'pereira', name: 'Pereira', location: { lat: 4.8133, lng: -75.6961 } },
    manizales: { key: 'manizales', name: 'Manizales', location: { lat: 5.0689, lng: -75.5174 } },
});

export const TOURISM_CATEGORIES = [
    'restaurants',
    'hotels',
    'attractions',
    'museums',
    'parks',
    'shopping',
    'nightlife',
] as const;

export type TourismCategory = typeof TOURISM_CATEGORIES[number];

export interface CategoryDefinition {
    placeType: string; // Upstream type filter
    queryTerm: string; // Prefix of the default search query
}

export const CATEGORIES: Readonly<Record<TourismCategory, CategoryDefinition>> = Object.freeze({
    restaurants: { placeType: 'restaurant', queryTerm: 'restaurantes' },
    hotels: { placeType: 'lodging', queryTerm: 'hoteles' },
    attractions: { placeType: 'tourist_attraction', queryTerm: 'lugares turísticos' },
    museums: { placeType: 'museum', queryTerm: 'museos' },
    parks: { placeType: 'park', queryTerm: 'parques' },
    shopping: { placeType: 'shopping_mall', queryTerm: 'centros comerciales' },
    nightlife: { placeType: 'night_club', queryTerm: 'discotecas' },
});

export const DEFAULT_RECOMMENDATION_CATEGORIES: readonly TourismCategory[] = ['restaurants', 'attractions', 'hotels'];

export function isTourismCategory(value: string): value is TourismCategory {
    return TOURISM_CATEGORIES.some((category) => category === value);
}

/**
 * Lookup by key, case- and accent-insensitive ("Bogotá" finds "bogota").
 */
export function getCity(key: string): City {
    const normalized = key
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .trim()
        .toLowerCase();
    // Own keys only: "constructor" and friends are not cities
    if (!Object.hasOwn(CITIES, normalized)) {
        throw new NotFoundError('City', key, { knownCities: Object.keys(CITIES) });
    }
    return CITIES[normalized];
}

export function buildCategoryQuery(category: TourismCategory, city: City): string {
    return `${CATEGORIES[category].queryTerm} ${city.name}`;
}
