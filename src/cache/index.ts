interface CacheEntry<T> {
    value: T,
    updatedAt: number,
}

/**
 * In-memory keyed cache. Entries older than `ttl` read as absent.
 * Owned by whoever creates it; nothing here is shared between sessions.
 */
export class Cache<T> {
    // milliseconds
    private readonly _ttl: number;
    private readonly _now: () => number;
    private _data = new Map<string, CacheEntry<T>>();

    /**
     * @param ttl - milliseconds, `Infinity` to never expire
     */
    constructor(ttl: number = Infinity, now: () => number = Date.now) {
        this._ttl = ttl;
        this._now = now;
    }

    public get size(): number {
        return this._data.size;
    }

    public isExpired(key: string): boolean {
        const entry = this._data.get(key);

        if (!entry) return true;

        return this._now() - entry.updatedAt > this._ttl;
    }

    public get(key: string): T | undefined {
        if (this.isExpired(key)) {
            this._data.delete(key);

            return undefined;
        }

        return this._data.get(key)?.value;
    }

    public update(key: string, value: T): void {
        this._data.set(key, { value, updatedAt: this._now() });
    }
}
