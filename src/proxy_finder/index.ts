import { Mutex } from 'async-mutex';
import type { Settings } from '~/config';
import { getCountries } from '~/countries';
import { Diagnostics, type DiagnosticsReport } from '~/diagnostics';
import { errorMessage, ExhaustionError } from '~/errors';
import { Logger } from '~/logger';
import { ProxyValidator } from '~/proxy_checker';
import type { CandidateValidator, ValidationOutcome } from '~/proxy_checker/types';
import { ConcurrentFetcher } from '~/proxy_fetcher';
import { ProxyFilter } from '~/proxy_filter';
import { DEFAULT_SOURCES } from '~/proxy_parser/sources';
import { ProxyCache } from '~/proxy_storage';
import {
    type GetManyOptions,
    type GetOneOptions,
    RotationManager,
    type RotationOutcome,
    RotationSession,
} from '~/rotation';
import { assertPositiveInteger, parseRotationRequest } from '~/rotation/request';
import type { CandidateProxy, CountryCode, SourceSpec, ValidatedProxy } from '~/types';

export interface FetchCandidatesOptions {
    sources?: SourceSpec[],
    maxCount?: number,
    countries?: string[],
}

export interface FindManyOptions extends Omit<GetManyOptions, 'seed'> {
    // Skip the persistent cache for this call.
    noCache?: boolean,
}

export interface ProxyFinderDeps {
    rotation: RotationManager,
    validator: CandidateValidator,
    cache: ProxyCache,
    diagnostics: Diagnostics,
    cacheMaxAgeHours: number,
    maxCandidates: number,
    logger?: Logger,
    now?: () => number,
}

/**
 * The public entry point: candidates, single checks, rotation and the persistent cache.
 */
export class ProxyFinder {
    private readonly _logger: Logger;
    private readonly _deps: ProxyFinderDeps;
    private readonly _now: () => number;
    private readonly _cacheLock = new Mutex();

    constructor(deps: ProxyFinderDeps) {
        this._deps = deps;
        this._now = deps.now ?? Date.now;
        this._logger = deps.logger ?? new Logger('ProxyFinder');
    }

    public async fetchCandidates(options: FetchCandidatesOptions = {}): Promise<CandidateProxy[]> {
        const { countries } = parseRotationRequest(options.countries);
        const maxCount = assertPositiveInteger('maxCount', options.maxCount ?? this._deps.maxCandidates);

        return this._deps.rotation.collect(countries, maxCount, options.sources);
    }

    /**
     * Validates one address, or a candidate with its hints.
     */
    public validate(target: string | CandidateProxy): Promise<ValidationOutcome> {
        const candidate: CandidateProxy = typeof target === 'string'
            ? {
                address: target.trim(),
                countryHint: 'unknown',
                anonymityHint: 'unknown',
                sourceName: 'manual',
                fetchedAt: new Date(),
            }
            : target;

        return this._deps.validator.validate(candidate);
    }

    public getOne(options: GetOneOptions = {}): Promise<ValidatedProxy> {
        return this._deps.rotation.getOne(options);
    }

    public async getMany(n: number, options: FindManyOptions = {}): Promise<ValidatedProxy[]> {
        const outcome = await this.findMany(n, options);

        if (!outcome.proxies.length) {
            throw new ExhaustionError(n, outcome.attempts);
        }

        return outcome.proxies;
    }

    /**
     * Like `RotationManager.findMany`, seeded with cached proxies. The cache is rewritten
     * with the new results plus the cached entries that were neither found dead nor validated
     * longer than `cacheMaxAgeHours` ago. Calls on one instance take the cache in turn.
     */
    public async findMany(n: number, options: FindManyOptions = {}): Promise<RotationOutcome> {
        assertPositiveInteger('n', n);
        parseRotationRequest(options.countries, options.anonymity);

        const { noCache, ...rotationOptions } = options;

        if (noCache) return this._deps.rotation.findMany(n, rotationOptions);

        return this._cacheLock.runExclusive(() => this._findManyCached(n, rotationOptions));
    }

    public countries(): Record<CountryCode, string> {
        return getCountries();
    }

    public diagnostics(): Promise<DiagnosticsReport> {
        return this._deps.diagnostics.run();
    }

    private async _findManyCached(n: number, options: Omit<GetManyOptions, 'seed'>): Promise<RotationOutcome> {
        const logger = this._logger.createChild('findMany');
        const session = options.session ?? new RotationSession();
        const cached = await this._deps.cache.load(this._deps.cacheMaxAgeHours);

        const outcome = await this._deps.rotation.findMany(n, {
            ...options,
            session,
            seed: cached.map(ProxyFinder._toCandidate),
        });

        const found = new Set(outcome.proxies.map((p) => p.address));
        const oldest = this._now() - this._deps.cacheMaxAgeHours * 60 * 60 * 1000;

        // Untouched entries keep their old validatedAt, so saving them does not make them fresh.
        const kept = cached
        .filter((p) => !found.has(p.address) && !session.wasRejected(p.address))
        .map((p) => session.lookup(p.address) ?? p)
        .filter((p) => p.validatedAt.getTime() >= oldest);

        try {
            await this._deps.cache.save(outcome.proxies.concat(kept));
        } catch (e) {
            if (e instanceof Error) {
                logger.warning('Failed to save proxies to cache:', errorMessage(e));
            } else throw e;
        }

        return outcome;
    }

    private static _toCandidate(proxy: ValidatedProxy): CandidateProxy {
        return {
            address: proxy.address,
            countryHint: proxy.country,
            anonymityHint: proxy.anonymity,
            sourceName: 'cache',
            fetchedAt: proxy.validatedAt,
        };
    }
}

export function createProxyFinder(settings: Settings, sources: SourceSpec[] = DEFAULT_SOURCES): ProxyFinder {
    const logger = new Logger('ProxyFinder');

    const validator = new ProxyValidator({
        reachabilityTimeout: settings.reachabilityTimeout,
        probeTimeout: settings.probeTimeout,
        lenient: settings.lenientValidation,
    }, logger.createChild('validator'));

    const rotation = new RotationManager({
        sources,
        maxRetries: settings.maxRetries,
        maxCandidates: settings.maxCandidates,
        maxSources: settings.maxSources,
        perSourceTimeout: settings.sourceTimeout,
        globalDeadline: settings.fetchDeadline,
        validationConcurrency: settings.validationConcurrency,
        maxAttemptsPerProxy: settings.maxAttemptsPerProxy,
    }, {
        fetcher: new ConcurrentFetcher(undefined, logger.createChild('fetcher')),
        filter: new ProxyFilter(undefined, logger.createChild('filter')),
        validator,
        logger: logger.createChild('rotation'),
    });

    return new ProxyFinder({
        rotation,
        validator,
        cache: new ProxyCache({
            filePath: settings.cacheFile,
            capacity: settings.cacheCapacity,
        }, logger.createChild('cache')),
        diagnostics: new Diagnostics({}, logger.createChild('diagnostics')),
        cacheMaxAgeHours: settings.cacheMaxAgeHours,
        maxCandidates: settings.maxCandidates,
        logger,
    });
}
