import type { AxiosProxyConfig } from 'axios';
import type { Anonymity } from '~/types';

const OCTET = '(25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)';
const ADDRESS_PATTERN = new RegExp(`^${ OCTET }\\.${ OCTET }\\.${ OCTET }\\.${ OCTET }:([1-9]\\d{0,4})$`);

export interface ParsedAddress {
    host: string,
    port: number,
}

/**
 * `IPv4:port`, port in [1, 65535]. Anything else is null.
 */
export function parseAddress(address: string): ParsedAddress | null {
    const matched = address.trim().match(ADDRESS_PATTERN);

    if (!matched) return null;

    const port = +matched[5];

    if (port > 65535) return null;

    return {
        host: matched.slice(1, 5).join('.'),
        port,
    };
}

export function isValidAddress(address: string): boolean {
    return parseAddress(address) !== null;
}

export function addressToAxiosProxy(address: string): AxiosProxyConfig {
    const parsed = parseAddress(address);

    if (!parsed) throw new Error(`address ${ address } is not ip:port`);

    return {
        protocol: 'http',
        host: parsed.host,
        port: parsed.port,
    };
}

export function normalizeAnonymity(raw: string | undefined | null): Anonymity {
    const value = raw?.trim().toLowerCase();

    if (!value) return 'unknown';

    // "elite proxy", "high anonymous", "HIA"
    if (value.includes('elite') || value.includes('high') || value === 'hia') return 'elite';
    if (value.includes('anonymous') || value === 'anm') return 'anonymous';
    if (value.includes('transparent') || value === 'noa') return 'transparent';

    return 'unknown';
}

/**
 * Keeps the first occurrence of every key.
 */
export function deleteDuplicates<T>(array: T[], keyOf: (item: T) => string): T[] {
    const seen = new Set<string>();

    return array.filter((item) => {
        const key = keyOf(item);

        if (seen.has(key)) return false;

        seen.add(key);

        return true;
    });
}

export function divideArrayIntoBatches<T>(array: T[], size: number): T[][] {
    const batches: T[][] = [];

    for (let i = 0; i < array.length; i += size) {
        batches.push(array.slice(i, i + size));
    }

    return batches;
}

/**
 * Runs `worker` over `items` with at most `size` calls in flight.
 * Workers are expected to handle their own errors; a throwing worker rejects the whole pool.
 * Once `shouldStop` returns true no new item is started, running ones are still awaited.
 */
export async function runPool<T>(
    items: T[],
    size: number,
    worker: (item: T, index: number) => Promise<void>,
    shouldStop: () => boolean = () => false,
): Promise<void> {
    let next = 0;

    const lane = async (): Promise<void> => {
        while (next < items.length && !shouldStop()) {
            const index = next++;

            await worker(items[index], index);
        }
    };

    const lanes = Array.from({ length: Math.max(1, Math.min(size, items.length)) }, lane);

    await Promise.all(lanes);
}

/**
 * Resolves with `fallback()` if `promise` has not settled after `ms`.
 * The timer is always cleared, so nothing outlives the call.
 */
export function withDeadline<T>(promise: Promise<T>, ms: number, fallback: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => {
            resolve(fallback());
        }, ms);

        promise.then(
            (value) => {
                clearTimeout(timer);
                resolve(value);
            },
            (e: unknown) => {
                clearTimeout(timer);
                reject(e);
            },
        );
    });
}

/**
 * Picks up to `count` items without replacement.
 */
export function sample<T>(array: T[], count: number, random: () => number = Math.random): T[] {
    const copy = array.slice();
    const take = Math.min(count, copy.length);

    for (let i = 0; i < take; i++) {
        const j = i + Math.floor(random() * (copy.length - i));

        [ copy[i], copy[j] ] = [ copy[j], copy[i] ];
    }

    return copy.slice(0, take);
}
