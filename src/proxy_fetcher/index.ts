import { normalizeCountry } from '~/countries';
import { errorMessage, SourceUnavailableError } from '~/errors';
import { Logger } from '~/logger';
import { HttpSourceAdapter, type SourceAdapter } from '~/proxy_parser/adapter';
import type { CandidateProxy, CountryCode, SourceRecord, SourceSpec } from '~/types';
import { normalizeAnonymity, runPool, withDeadline } from '~/utils';

export interface FetchOptions {
    // milliseconds
    perSourceTimeout: number,
    // milliseconds, for the whole call
    globalDeadline: number,
    country?: CountryCode,
    maxSources?: number,
}

export interface CandidateSource {
    fetch(sources: SourceSpec[], options: FetchOptions): Promise<CandidateProxy[]>;
}

export class ConcurrentFetcher implements CandidateSource {
    public static MAX_WORKERS = 5;

    private readonly _adapter: SourceAdapter;
    private readonly _logger: Logger;

    constructor(adapter: SourceAdapter = new HttpSourceAdapter(), logger: Logger = new Logger('ConcurrentFetcher')) {
        this._adapter = adapter;
        this._logger = logger;
    }

    /**
     * Country-capable sources first when a country is asked for, then by priority.
     */
    public static orderSources(sources: SourceSpec[], country?: CountryCode, maxSources?: number): SourceSpec[] {
        const ordered = sources
        .map((spec, index) => ({ spec, index }))
        .sort((a, b) => {
            if (country && a.spec.countrySupported !== b.spec.countrySupported) {
                return a.spec.countrySupported ? -1 : 1;
            }

            return a.spec.priority - b.spec.priority || a.index - b.index;
        })
        .map(({ spec }) => spec);

        return maxSources === undefined ? ordered : ordered.slice(0, maxSources);
    }

    /**
     * Fans out one task per source and fans the candidates back in, in completion order.
     * A failing source contributes nothing. Past `globalDeadline` in-flight tasks are
     * aborted and whatever already arrived is returned.
     */
    public async fetch(sources: SourceSpec[], options: FetchOptions): Promise<CandidateProxy[]> {
        const ordered = ConcurrentFetcher.orderSources(sources, options.country, options.maxSources);

        if (!ordered.length) return [];

        const logger = this._logger.createChild(options.country ?? 'all');
        const controllers = new Set<AbortController>();
        const candidates: CandidateProxy[] = [];
        let expired = false;

        logger.log(`Fetching proxies from ${ ordered.length } sources`);

        // Only completed tasks push, each in one synchronous step.
        const work = runPool(ordered, Math.min(ordered.length, ConcurrentFetcher.MAX_WORKERS), async (spec) => {
            const controller = new AbortController();
            controllers.add(controller);

            try {
                const records = await this._fetchOne(spec, options, controller);

                if (expired) return;

                candidates.push(...records.map((r) => ConcurrentFetcher._toCandidate(r, spec, options.country)));
                logger.log(`Fetched ${ records.length } proxies from ${ spec.name }`);
            } catch (e) {
                if (expired) return;

                if (e instanceof Error) {
                    logger.warning(`Error fetching from ${ spec.name }:`, errorMessage(e));
                } else throw e;
            } finally {
                controllers.delete(controller);
            }
        }, () => expired);

        const completed = await withDeadline(work.then(() => true), options.globalDeadline, () => false);

        if (!completed) {
            expired = true;
            logger.warning(
                `Deadline of ${ options.globalDeadline }ms reached, abandoning ${ controllers.size } in-flight sources`,
            );
            controllers.forEach((c) => c.abort());
        }

        logger.log(`Found ${ candidates.length } proxies before filtering`);

        return candidates;
    }

    private _fetchOne(spec: SourceSpec, options: FetchOptions, controller: AbortController): Promise<SourceRecord[]> {
        const timer = setTimeout(() => controller.abort(), options.perSourceTimeout);

        const aborted = new Promise<never>((_, reject) => {
            controller.signal.addEventListener('abort', () => {
                reject(new SourceUnavailableError(spec.name, 'timed out'));
            }, { once: true });
        });

        return Promise.race([
            this._adapter.fetch(spec, {
                country: options.country,
                timeout: options.perSourceTimeout,
                signal: controller.signal,
            }),
            aborted,
        ])
        .finally(() => clearTimeout(timer));
    }

    private static _toCandidate(record: SourceRecord, spec: SourceSpec, country?: CountryCode): CandidateProxy {
        let countryHint = normalizeCountry(record.country);

        // A source that filtered by country server-side vouches for it.
        if (countryHint === 'unknown' && country && spec.countrySupported) countryHint = country;

        return {
            address: record.address.trim(),
            countryHint,
            anonymityHint: normalizeAnonymity(record.anonymity),
            sourceName: spec.name,
            fetchedAt: new Date(),
        };
    }
}
