import { Logger } from '~/logger';
import { CountryHeuristic } from '~/proxy_filter/country-heuristic';
import type { CandidateProxy, CountryCode } from '~/types';
import { isValidAddress } from '~/utils';

export interface FilterOptions {
    // Already validated ISO codes.
    countries?: CountryCode[],
    maxCount: number,
}

export class ProxyFilter {
    private readonly _logger: Logger;
    private readonly _heuristic: CountryHeuristic;

    constructor(heuristic: CountryHeuristic = new CountryHeuristic(), logger: Logger = new Logger('ProxyFilter')) {
        this._heuristic = heuristic;
        this._logger = logger;
    }

    /**
     * Syntax check, dedupe by address (first occurrence wins), country allowlist, truncate.
     * Returns copies; the input list is left untouched.
     */
    public filter(candidates: CandidateProxy[], options: FilterOptions): CandidateProxy[] {
        const allowlist = options.countries?.length
            ? new Set(options.countries.map((c) => c.toUpperCase()))
            : null;

        const seen = new Set<string>();
        const result: CandidateProxy[] = [];
        let matchedByHeuristic = 0;

        for (const candidate of candidates) {
            if (result.length >= options.maxCount) break;

            const address = candidate.address.trim();

            if (!isValidAddress(address) || seen.has(address)) continue;

            seen.add(address);

            let countryHint = candidate.countryHint.toUpperCase() === 'UNKNOWN'
                ? 'unknown'
                : candidate.countryHint.toUpperCase();

            if (allowlist && !allowlist.has(countryHint)) {
                if (countryHint !== 'unknown') continue;

                countryHint = this._heuristic.guess(address);

                if (!allowlist.has(countryHint)) continue;

                matchedByHeuristic++;
            }

            result.push({ ...candidate, address, countryHint });
        }

        if (allowlist) {
            this._logger.log(
                `${ result.length } of ${ seen.size } unique proxies match ${ [ ...allowlist ].join(',') }`,
                `(${ matchedByHeuristic } by address heuristic)`,
            );
        }

        return result;
    }
}
