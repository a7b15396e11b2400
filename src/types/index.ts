export const ANONYMITY_LEVELS = [ 'transparent', 'anonymous', 'elite', 'unknown' ] as const;

export type Anonymity = typeof ANONYMITY_LEVELS[number];

// 'unknown' when neither the source nor the heuristic could tell.
export type CountryCode = string;

export type ValidationStatus = 'valid' | 'unvalidated';

export interface CandidateProxy {
    // ip:port
    address: string,
    countryHint: CountryCode,
    anonymityHint: Anonymity,
    sourceName: string,
    fetchedAt: Date,
}

export interface ValidatedProxy {
    address: string,
    country: CountryCode,
    anonymity: Anonymity,
    latencySeconds: number,
    requiresAuth: boolean,
    status: ValidationStatus,
    validatedAt: Date,
    exitIp?: string,
}

export interface CacheRecord extends ValidatedProxy {
    cachedAt: Date,
}

/**
 * One entry as a source reports it, before any normalization.
 */
export interface SourceRecord {
    address: string,
    country?: string,
    anonymity?: string,
}

export interface SourceSpec {
    name: string,
    countrySupported: boolean,
    // Lower runs first.
    priority: number,
    url: (country?: CountryCode) => string,
    parse: (body: string) => SourceRecord[],
    headers?: Record<string, string>,
}
