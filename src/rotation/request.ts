import { assertCountryCodes } from '~/countries';
import { ConfigurationError } from '~/errors';
import type { Anonymity, CountryCode } from '~/types';

export type AnonymityFilter = Exclude<Anonymity, 'unknown'>;

const ANONYMITY_FILTERS: AnonymityFilter[] = [ 'transparent', 'anonymous', 'elite' ];

export interface RotationRequest {
    countries?: CountryCode[],
    anonymity?: AnonymityFilter,
}

/**
 * Rejects bad input before any network activity.
 */
export function parseRotationRequest(countries?: string[], anonymity?: string): RotationRequest {
    return {
        countries: assertCountryCodes(countries),
        anonymity: parseAnonymityFilter(anonymity),
    };
}

export function parseAnonymityFilter(anonymity?: string): AnonymityFilter | undefined {
    if (anonymity === undefined || anonymity === '') return undefined;

    const value = anonymity.trim().toLowerCase();
    const match = ANONYMITY_FILTERS.find((a) => a === value);

    if (!match) {
        throw new ConfigurationError(`anonymity must be one of ${ ANONYMITY_FILTERS.join(', ') }, got "${ anonymity }"`);
    }

    return match;
}

export function assertPositiveInteger(name: string, value: number): number {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(`${ name } must be a positive integer, got ${ value }`);
    }

    return value;
}
