import { Cache } from '~/cache';
import type { CountryCode } from '~/types';
import prefixes from './country_prefixes.json';

interface PrefixRule {
    country: CountryCode,
    prefixes: string[],
}

const RULES: PrefixRule[] = prefixes;

/**
 * Guesses a country from the leading octets of an address.
 *
 * Best effort only: the prefix table is a rough static approximation with no
 * ground truth behind it. Callers must treat the answer as a hint, never as
 * geolocation. The result is either one of the table's codes or 'unknown'.
 */
export class CountryHeuristic {
    private readonly _cache: Cache<CountryCode>;

    constructor(cache: Cache<CountryCode> = new Cache<CountryCode>()) {
        this._cache = cache;
    }

    public guess(address: string): CountryCode {
        const cached = this._cache.get(address);

        if (cached) return cached;

        const ip = address.split(':')[0];
        const rule = RULES.find((r) => r.prefixes.some((p) => ip.startsWith(p)));
        const country = rule?.country ?? 'unknown';

        this._cache.update(address, country);

        return country;
    }
}
