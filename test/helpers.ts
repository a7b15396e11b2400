import { Diagnostics } from '~/diagnostics';
import type { CandidateValidator, ValidationOutcome } from '~/proxy_checker/types';
import type { CandidateSource, FetchOptions } from '~/proxy_fetcher';
import { ProxyFilter } from '~/proxy_filter';
import { ProxyFinder } from '~/proxy_finder';
import { ProxyCache } from '~/proxy_storage';
import { RotationManager } from '~/rotation';
import type { CandidateProxy, SourceSpec, ValidatedProxy } from '~/types';

export function candidate(address: string, overrides: Partial<CandidateProxy> = {}): CandidateProxy {
    return {
        address,
        countryHint: 'unknown',
        anonymityHint: 'unknown',
        sourceName: 'test',
        fetchedAt: new Date('2024-01-01T00:00:00Z'),
        ...overrides,
    };
}

export function validated(address: string, overrides: Partial<ValidatedProxy> = {}): ValidatedProxy {
    return {
        address,
        country: 'US',
        anonymity: 'elite',
        latencySeconds: 1,
        requiresAuth: false,
        status: 'valid',
        validatedAt: new Date('2024-01-01T00:00:00Z'),
        ...overrides,
    };
}

export function sourceSpec(name: string, overrides: Partial<SourceSpec> = {}): SourceSpec {
    return {
        name,
        countrySupported: false,
        priority: 1,
        url: () => `http://${ name }.test/list`,
        parse: () => [],
        ...overrides,
    };
}

/**
 * Hands out one prepared batch per call, then empty lists.
 */
export class FakeFetcher implements CandidateSource {
    public readonly calls: FetchOptions[] = [];
    private readonly _rounds: CandidateProxy[][];

    constructor(rounds: CandidateProxy[][]) {
        this._rounds = rounds;
    }

    public async fetch(sources: SourceSpec[], options: FetchOptions): Promise<CandidateProxy[]> {
        this.calls.push(options);

        return this._rounds[this.calls.length - 1] ?? [];
    }
}

/**
 * Addresses listed in `good` validate with the given latency, everything else is unreachable.
 * With `now`, successes are stamped with that clock instead of a fixed date.
 */
export class FakeValidator implements CandidateValidator {
    public readonly probed: string[] = [];
    private readonly _good: Map<string, Partial<ValidatedProxy>>;
    private readonly _now?: () => number;

    constructor(good: Record<string, Partial<ValidatedProxy>>, now?: () => number) {
        this._good = new Map(Object.entries(good));
        this._now = now;
    }

    public async validate(c: CandidateProxy): Promise<ValidationOutcome> {
        this.probed.push(c.address);

        const props = this._good.get(c.address);

        if (!props) return { ok: false, address: c.address, reason: 'unreachable' };

        return {
            ok: true,
            proxy: validated(c.address, {
                country: c.countryHint,
                ...(this._now ? { validatedAt: new Date(this._now()) } : {}),
                ...props,
            }),
        };
    }
}

export interface TestFinder {
    finder: ProxyFinder,
    fetcher: FakeFetcher,
    validator: FakeValidator,
}

export interface TestFinderOptions {
    now?: () => number,
    validationConcurrency?: number,
}

export function createTestFinder(
    rounds: CandidateProxy[][],
    good: Record<string, Partial<ValidatedProxy>>,
    cacheFile: string,
    options: TestFinderOptions = {},
): TestFinder {
    const fetcher = new FakeFetcher(rounds);
    const validator = new FakeValidator(good, options.now);

    const rotation = new RotationManager({
        sources: [ sourceSpec('test') ],
        maxRetries: 3,
        maxCandidates: 100,
        perSourceTimeout: 100,
        globalDeadline: 100,
        validationConcurrency: options.validationConcurrency ?? 2,
        maxAttemptsPerProxy: 10,
    }, { fetcher, filter: new ProxyFilter(), validator });

    const finder = new ProxyFinder({
        rotation,
        validator,
        cache: new ProxyCache({ filePath: cacheFile, capacity: 100, now: options.now }),
        diagnostics: new Diagnostics({ echoes: [], lookup: async () => [ '192.0.2.1' ] }),
        cacheMaxAgeHours: 24,
        maxCandidates: 100,
        now: options.now,
    });

    return { finder, fetcher, validator };
}
