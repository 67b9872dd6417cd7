import { Registry, collectDefaultMetrics, Counter, Histogram } from 'prom-client';
import logger from '../utils/logger.js';

// One registry for the whole process, shared by core and provider
export const register = new Registry();

let initialized = false;

export function initMetrics(): void {
    if (initialized) return;

    collectDefaultMetrics({ register });
    logger.info('📊 Shared Metrics Registry initialized');
    initialized = true;
}

export async function getMetrics(): Promise<string> {
    return register.metrics();
}

// ============================================
// Cache Metrics
// ============================================

export const cacheHits = new Counter({
    name: 'places_cache_hits_total',
    help: 'Cache lookups that returned a valid entry',
    labelNames: ['backend'],
    registers: [register],
});

export const cacheMisses = new Counter({
    name: 'places_cache_misses_total',
    help: 'Cache lookups that found nothing, a stale entry or a corrupt record',
    labelNames: ['backend'],
    registers: [register],
});

// ============================================
// Upstream Metrics
// ============================================

export const upstreamCalls = new Counter({
    name: 'places_upstream_calls_total',
    help: 'Outbound places API calls',
    labelNames: ['operation', 'outcome'], // textSearch/placeDetails, success/quota/unavailable/rejected
    registers: [register],
});

export const upstreamRetries = new Counter({
    name: 'places_upstream_retries_total',
    help: 'Retry attempts after a transient upstream failure',
    labelNames: ['operation'],
    registers: [register],
});

// ============================================
// Fetch Job Metrics
// ============================================

export const categoryFetchDuration = new Histogram({
    name: 'places_category_fetch_duration_seconds',
    help: 'Duration of a category fetch, cache hits included',
    labelNames: ['category', 'source'], // source: cache/upstream/error
    buckets: [0.005, 0.05, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [register],
});

export const fetchJobTransitions = new Counter({
    name: 'places_fetch_job_transitions_total',
    help: 'Fetch job state transitions',
    labelNames: ['from_state', 'to_state'],
    registers: [register],
});
