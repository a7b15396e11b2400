import { ConfigurationError } from '~/errors';
import type { CountryCode } from '~/types';
import countries from './countries.json';

const COUNTRY_NAMES: Record<string, string> = countries;

// Names some sources print instead of a code.
const ALIASES: Record<string, CountryCode> = {
    'usa': 'US',
    'united states of america': 'US',
    'uk': 'GB',
    'great britain': 'GB',
    'england': 'GB',
    'russian federation': 'RU',
    'korea': 'KR',
    'republic of korea': 'KR',
    'czech republic': 'CZ',
    'viet nam': 'VN',
};

const CODES_BY_NAME: Record<string, CountryCode> = Object.entries(COUNTRY_NAMES)
.reduce((acc, [ code, name ]) => {
    acc[name.toLowerCase()] = code;

    return acc;
}, { ...ALIASES });

export function isCountryCode(value: string): boolean {
    return Object.hasOwn(COUNTRY_NAMES, value.toUpperCase());
}

export function getCountries(): Record<CountryCode, string> {
    return { ...COUNTRY_NAMES };
}

/**
 * Maps whatever a source reported (code or english name) onto an ISO code.
 */
export function normalizeCountry(raw: string | undefined | null): CountryCode {
    const value = raw?.trim();

    if (!value) return 'unknown';
    if (value.length === 2 && isCountryCode(value)) return value.toUpperCase();

    return CODES_BY_NAME[value.toLowerCase()] ?? 'unknown';
}

/**
 * Validates user-supplied codes before anything touches the network.
 */
export function assertCountryCodes(codes: string[] | undefined): CountryCode[] | undefined {
    if (!codes || codes.length === 0) return undefined;

    const normalized = codes.map((c) => c.trim().toUpperCase());
    const unknown = normalized.filter((c) => c.length !== 2 || !isCountryCode(c));

    if (unknown.length) {
        throw new ConfigurationError(`unrecognized country code(s): ${ unknown.join(', ') }`);
    }

    return [ ...new Set(normalized) ];
}
