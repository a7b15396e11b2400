import { z } from 'zod';
import { errorMessage } from '~/errors';
import { FileSystem } from '~/FileSystem';
import { Logger } from '~/logger';
import { ANONYMITY_LEVELS, type CacheRecord, type ValidatedProxy } from '~/types';
import { deleteDuplicates, isValidAddress } from '~/utils';

const CacheRecordSchema = z.object({
    address: z.string().refine(isValidAddress, 'not ip:port'),
    country: z.string(),
    anonymity: z.enum(ANONYMITY_LEVELS),
    latencySeconds: z.number().nonnegative(),
    requiresAuth: z.boolean(),
    status: z.enum([ 'valid', 'unvalidated' ]),
    validatedAt: z.coerce.date(),
    cachedAt: z.coerce.date(),
    exitIp: z.string().optional(),
});

export interface ProxyCacheOptions {
    filePath: string,
    // Entries kept on save; the most recently validated win.
    capacity: number,
    now?: () => number,
}

/**
 * Validated proxies on disk as one JSON array. Every save rewrites the whole file.
 * Not safe for concurrent writers; serialize access above this class.
 */
export class ProxyCache {
    private readonly _logger: Logger;
    private readonly _filePath: string;
    private readonly _capacity: number;
    private readonly _now: () => number;

    constructor(options: ProxyCacheOptions, logger: Logger = new Logger('ProxyCache')) {
        this._filePath = options.filePath;
        this._capacity = options.capacity;
        this._now = options.now ?? Date.now;
        this._logger = logger;
    }

    public async save(entries: ValidatedProxy[]): Promise<void> {
        const cachedAt = new Date(this._now());

        const records: CacheRecord[] = deleteDuplicates(
            entries
            .slice()
            .sort((a, b) => b.validatedAt.getTime() - a.validatedAt.getTime()),
            (p) => p.address,
        )
        .slice(0, this._capacity)
        .map((p) => ({ ...p, cachedAt }));

        await FileSystem.saveToFile(this._filePath, records.map((r) => ({
            ...r,
            validatedAt: r.validatedAt.toISOString(),
            cachedAt: r.cachedAt.toISOString(),
        })));

        this._logger.log(`Saved ${ records.length } proxies to cache`);
    }

    /**
     * Entries cached within the last `maxAgeHours`. A missing or unreadable file reads as empty,
     * malformed records are skipped.
     */
    public async load(maxAgeHours: number): Promise<ValidatedProxy[]> {
        if (!await FileSystem.exists(this._filePath)) {
            this._logger.log('No proxy cache file exists');

            return [];
        }

        let raw: unknown;

        try {
            raw = await FileSystem.loadFromFile(this._filePath);
        } catch (e) {
            if (e instanceof Error) {
                this._logger.warning('Failed to load proxies from cache:', errorMessage(e));

                return [];
            } else throw e;
        }

        if (!Array.isArray(raw)) {
            this._logger.warning('Cache file does not hold a list, ignoring it');

            return [];
        }

        const items: unknown[] = raw;

        const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
        const now = this._now();
        let malformed = 0;

        const fresh = items.reduce<ValidatedProxy[]>((acc, item) => {
            const parsed = CacheRecordSchema.safeParse(item);

            if (!parsed.success) {
                malformed++;

                return acc;
            }

            const { cachedAt, ...proxy } = parsed.data;

            if (now - cachedAt.getTime() <= maxAgeMs) acc.push(proxy);

            return acc;
        }, []);

        const result = deleteDuplicates(fresh, (p) => p.address);

        this._logger.log(
            `Loaded ${ result.length } valid proxies from cache (out of ${ items.length } total, ${ malformed } malformed)`,
        );

        return result;
    }
}
