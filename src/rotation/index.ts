import { ExhaustionError } from '~/errors';
import { Logger } from '~/logger';
import type { CandidateValidator, ValidationOutcome } from '~/proxy_checker/types';
import type { CandidateSource } from '~/proxy_fetcher';
import type { ProxyFilter } from '~/proxy_filter';
import {
    type AnonymityFilter,
    assertPositiveInteger,
    parseRotationRequest,
    type RotationRequest,
} from '~/rotation/request';
import { RotationSession } from '~/rotation/session';
import type { CandidateProxy, CountryCode, SourceSpec, ValidatedProxy } from '~/types';
import { divideArrayIntoBatches, runPool, sample } from '~/utils';

export type RotationState = 'idle' | 'fetching' | 'validating' | 'satisfied' | 'exhausted';

export interface RotationOptions {
    sources: SourceSpec[],
    // getOne rounds, and consecutive empty fetch rounds tolerated by getMany.
    maxRetries: number,
    // Candidates kept per fetch round (per country when several are asked for).
    maxCandidates: number,
    maxSources?: number,
    // milliseconds
    perSourceTimeout: number,
    // milliseconds
    globalDeadline: number,
    validationConcurrency: number,
    maxAttemptsPerProxy: number,
    /**
     * Probes allowed for `n` proxies. Defaults to `maxAttemptsPerProxy * n`.
     * A tunable heuristic, not a correctness bound.
     */
    attemptBudget?: (n: number, maxAttemptsPerProxy: number) => number,
    // Trailing share of the budget in which already seen candidates are retried.
    retryStretch?: number,
    // Seen candidates retried per round inside the stretch.
    retrySampleSize?: number,
    random?: () => number,
    onStateChange?: (state: RotationState) => void,
}

export interface GetOneOptions {
    countries?: string[],
    anonymity?: string,
    session?: RotationSession,
}

export interface GetManyOptions extends GetOneOptions {
    maxAttemptsPerProxy?: number,
    // Candidates tried ahead of the first fetch, e.g. entries from the persistent cache.
    seed?: CandidateProxy[],
}

export interface RotationOutcome {
    state: 'satisfied' | 'exhausted',
    // Ascending latency, at most `n`.
    proxies: ValidatedProxy[],
    attempts: number,
    budget: number,
}

export interface RotationCollaborators {
    fetcher: CandidateSource,
    filter: ProxyFilter,
    validator: CandidateValidator,
    logger?: Logger,
}

export class RotationManager {
    public static DEFAULT_RETRY_STRETCH = 0.2;
    public static DEFAULT_RETRY_SAMPLE_SIZE = 10;

    private readonly _logger: Logger;
    private readonly _options: RotationOptions;
    private readonly _fetcher: CandidateSource;
    private readonly _filter: ProxyFilter;
    private readonly _validator: CandidateValidator;
    private _state: RotationState = 'idle';

    constructor(options: RotationOptions, collaborators: RotationCollaborators) {
        this._options = options;
        this._fetcher = collaborators.fetcher;
        this._filter = collaborators.filter;
        this._validator = collaborators.validator;
        this._logger = collaborators.logger ?? new Logger('RotationManager');
    }

    // Where the last request ended, or where the running one is.
    public get state(): RotationState {
        return this._state;
    }

    /**
     * One fetch round: fetch (one country at a time when several are given), then filter.
     */
    public async collect(
        countries?: CountryCode[],
        maxCount: number = this._options.maxCandidates,
        sources: SourceSpec[] = this._options.sources,
    ): Promise<CandidateProxy[]> {
        this._setState('fetching');

        const fetchOptions = {
            perSourceTimeout: this._options.perSourceTimeout,
            globalDeadline: this._options.globalDeadline,
            maxSources: this._options.maxSources,
        };

        if (countries && countries.length > 1) {
            const fetched: CandidateProxy[] = [];

            for (const country of countries) {
                const candidates = await this._fetcher.fetch(sources, { ...fetchOptions, country });

                this._logger.log(`Fetched ${ candidates.length } proxies from ${ country }`);
                fetched.push(...candidates);
            }

            return this._filter.filter(fetched, { countries, maxCount: maxCount * countries.length });
        }

        const fetched = await this._fetcher.fetch(sources, { ...fetchOptions, country: countries?.[0] });

        return this._filter.filter(fetched, { countries, maxCount });
    }

    /**
     * The first proxy that validates and matches `anonymity`, within `maxRetries` rounds.
     * Addresses the session already served are skipped, so repeated calls rotate.
     */
    public async getOne(options: GetOneOptions = {}): Promise<ValidatedProxy> {
        const request = parseRotationRequest(options.countries, options.anonymity);
        const session = options.session ?? new RotationSession();
        const logger = this._logger.createChild('getOne');
        const groups: (CountryCode[] | undefined)[] = request.countries && request.countries.length > 1
            ? request.countries.map((c) => [ c ])
            : [ request.countries ];

        const counter = logger.createCounter(this._options.maxRetries);

        for (let attempt = 1; attempt <= this._options.maxRetries; attempt++) {
            for (const group of groups) {
                const candidates = (await this.collect(group))
                .filter((c) => !session.isServed(c.address) && !session.wasRejected(c.address));

                const found = await this._firstValid(candidates, request.anonymity, session);

                if (found) {
                    session.markServed(found.address);
                    logger.happy(`Found valid proxy${ group ? ` from ${ group[0] }` : '' }: ${ found.address }`);
                    this._setState('satisfied');

                    return found;
                }
            }

            counter.warning('No valid proxies found');
        }

        this._setState('exhausted');

        throw new ExhaustionError(1, this._options.maxRetries);
    }

    public async getMany(n: number, options: GetManyOptions = {}): Promise<ValidatedProxy[]> {
        const outcome = await this.findMany(n, options);

        if (!outcome.proxies.length) {
            throw new ExhaustionError(n, outcome.attempts);
        }

        return outcome.proxies;
    }

    /**
     * Fetch, filter and validate rounds until `n` proxies are found or the attempt budget is spent.
     * Never throws for "nothing found": the outcome says which way it ended.
     * Callers that need exactly `n` must check the length.
     */
    public async findMany(n: number, options: GetManyOptions = {}): Promise<RotationOutcome> {
        assertPositiveInteger('n', n);

        const request = parseRotationRequest(options.countries, options.anonymity);
        const maxAttemptsPerProxy = assertPositiveInteger(
            'maxAttemptsPerProxy',
            options.maxAttemptsPerProxy ?? this._options.maxAttemptsPerProxy,
        );
        const session = options.session ?? new RotationSession();
        const logger = this._logger.createChild('getMany');

        const budget = Math.max(1, Math.floor(this._attemptBudget(n, maxAttemptsPerProxy)));
        const stretchStart = Math.floor(budget * (1 - (this._options.retryStretch ?? RotationManager.DEFAULT_RETRY_STRETCH)));
        const sampleSize = this._options.retrySampleSize ?? RotationManager.DEFAULT_RETRY_SAMPLE_SIZE;

        const found = new Map<string, ValidatedProxy>();
        let seed = options.seed ?? [];
        let attempts = 0;
        let emptyRounds = 0;
        let round = 0;

        while (found.size < n && attempts < budget) {
            const roundLogger = logger.createChild(`round ${ ++round }`);

            // The seed gets a round of its own, fetching starts once it falls short.
            const seeded = seed.length
                ? this._filter.filter(seed, { countries: request.countries, maxCount: seed.length })
                : [];

            seed = [];

            const candidates = seeded.length ? seeded : await this.collect(request.countries);

            if (!candidates.length) {
                attempts++;
                roundLogger.warning('No proxies fetched');

                if (++emptyRounds >= this._options.maxRetries) break;

                continue;
            }

            emptyRounds = 0;

            const fresh = candidates.filter((c) => !session.isSeen(c.address));

            // Already proven in this session, taken without a new probe.
            const reusable = candidates.filter((c) => {
                const proxy = session.lookup(c.address);

                return proxy !== undefined && !found.has(c.address) && RotationManager._matches(proxy, request);
            });

            if (!fresh.length && !reusable.length && attempts < stretchStart) {
                roundLogger.warning('No new proxies available, retrying seen ones');
                attempts = stretchStart;
            }

            const retry = attempts >= stretchStart
                ? sample(
                    candidates.filter((c) => session.isSeen(c.address) && !found.has(c.address) && !session.lookup(c.address)),
                    sampleSize,
                    this._options.random,
                )
                : [];

            const pool = reusable.concat(fresh, retry);

            if (!pool.length) {
                roundLogger.warning('Nothing left to try');
                break;
            }

            roundLogger.log(`Validating ${ fresh.length } new and ${ retry.length } retried proxies`
                + (reusable.length ? `, reusing ${ reusable.length }` : ''));
            this._setState('validating');

            await runPool(pool, this._options.validationConcurrency, async (candidate) => {
                const proxy = await this._validateOnce(candidate, session, () => attempts++);

                if (proxy && RotationManager._matches(proxy, request) && found.size < n && !found.has(proxy.address)) {
                    found.set(proxy.address, proxy);
                    roundLogger.happy(`Found valid proxy: ${ proxy.address } (${ found.size }/${ n })`);
                }
            }, () => found.size >= n || attempts >= budget);
        }

        const proxies = [ ...found.values() ]
        .sort((a, b) => a.latencySeconds - b.latencySeconds)
        .slice(0, n);

        if (proxies.length >= n) {
            this._setState('satisfied');

            return { state: 'satisfied', proxies, attempts, budget };
        }

        this._setState('exhausted');
        logger.warning(`Found ${ proxies.length }/${ n } proxies after ${ attempts } of ${ budget } attempts`);

        return { state: 'exhausted', proxies, attempts, budget };
    }

    private _attemptBudget(n: number, maxAttemptsPerProxy: number): number {
        return this._options.attemptBudget
            ? this._options.attemptBudget(n, maxAttemptsPerProxy)
            : maxAttemptsPerProxy * n;
    }

    /**
     * Validates batch by batch and returns the earliest success in candidate order.
     */
    private async _firstValid(
        candidates: CandidateProxy[],
        anonymity: AnonymityFilter | undefined,
        session: RotationSession,
    ): Promise<ValidatedProxy | undefined> {
        if (!candidates.length) return undefined;

        this._setState('validating');

        for (const batch of divideArrayIntoBatches(candidates, this._options.validationConcurrency)) {
            const validated = await Promise.all(batch.map((c) => this._validateOnce(c, session)));
            const found = validated.find((p) => p && RotationManager._matches(p, { anonymity }));

            if (found) return found;
        }

        return undefined;
    }

    /**
     * Reuses the session's verdict for addresses it already proved good; only a real probe
     * calls `onProbe`.
     */
    private async _validateOnce(
        candidate: CandidateProxy,
        session: RotationSession,
        onProbe?: () => void,
    ): Promise<ValidatedProxy | undefined> {
        session.markSeen(candidate.address);

        const cached = session.lookup(candidate.address);

        if (cached) return cached;

        onProbe?.();

        const outcome: ValidationOutcome = await this._validator.validate(candidate);

        session.remember(outcome);

        return outcome.ok ? outcome.proxy : undefined;
    }

    private static _matches(proxy: ValidatedProxy, request: RotationRequest): boolean {
        return !request.anonymity || proxy.anonymity === request.anonymity;
    }

    private _setState(state: RotationState): void {
        this._state = state;
        this._options.onStateChange?.(state);
    }
}

export { RotationSession } from '~/rotation/session';
