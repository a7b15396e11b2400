import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ProxyCache } from '~/proxy_storage';
import { validated } from './helpers';

const HOUR = 60 * 60 * 1000;

describe('ProxyCache', () => {
    let dir: string;
    let filePath: string;
    let now: number;

    const cache = (capacity: number = 100) => new ProxyCache({ filePath, capacity, now: () => now });

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'relay-finder-'));
        filePath = join(dir, 'nested', 'cache.json');
        now = Date.parse('2024-05-01T12:00:00Z');
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('returns what was saved', async () => {
        const entries = [
            validated('1.2.3.4:8080', { latencySeconds: 0.3, exitIp: '203.0.113.1' }),
            validated('5.6.7.8:3128', { anonymity: 'unknown', status: 'unvalidated', latencySeconds: 999.99 }),
        ];

        await cache().save(entries);

        expect(await cache().load(24)).toEqual(entries);
    });

    it('writes ISO timestamps with cachedAt', async () => {
        await cache().save([ validated('1.2.3.4:8080') ]);

        const written: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

        expect(written).toEqual([ {
            address: '1.2.3.4:8080',
            country: 'US',
            anonymity: 'elite',
            latencySeconds: 1,
            requiresAuth: false,
            status: 'valid',
            validatedAt: '2024-01-01T00:00:00.000Z',
            cachedAt: '2024-05-01T12:00:00.000Z',
        } ]);
    });

    it('drops entries older than the max age', async () => {
        await cache().save([ validated('1.2.3.4:8080') ]);

        now += 24 * HOUR;
        expect(await cache().load(24)).toHaveLength(1);

        now += 1;
        expect(await cache().load(24)).toEqual([]);
    });

    it('reads a missing file as empty', async () => {
        await expect(cache().load(24)).resolves.toEqual([]);
    });

    it('reads an unparseable file as empty', async () => {
        await cache().save([]);
        writeFileSync(filePath, '{ not json');

        await expect(cache().load(24)).resolves.toEqual([]);
    });

    it('skips malformed records', async () => {
        await cache().save([]);
        writeFileSync(filePath, JSON.stringify([
            { address: 'garbage' },
            {
                address: '1.2.3.4:8080',
                country: 'US',
                anonymity: 'elite',
                latencySeconds: 1,
                requiresAuth: false,
                status: 'valid',
                validatedAt: '2024-05-01T11:00:00.000Z',
                cachedAt: '2024-05-01T11:00:00.000Z',
            },
            { ...validated('5.6.7.8:80'), anonymity: 'invisible', cachedAt: '2024-05-01T11:00:00.000Z' },
        ]));

        const loaded = await cache().load(24);

        expect(loaded.map((p) => p.address)).toEqual([ '1.2.3.4:8080' ]);
        expect(loaded[0].validatedAt).toEqual(new Date('2024-05-01T11:00:00.000Z'));
    });

    it('keeps the most recently validated entries up to capacity', async () => {
        await cache(2).save([
            validated('1.1.1.1:80', { validatedAt: new Date('2024-04-01T00:00:00Z') }),
            validated('2.2.2.2:80', { validatedAt: new Date('2024-04-03T00:00:00Z') }),
            validated('3.3.3.3:80', { validatedAt: new Date('2024-04-02T00:00:00Z') }),
            validated('2.2.2.2:80', { validatedAt: new Date('2024-03-01T00:00:00Z') }),
        ]);

        const loaded = await cache().load(24);

        expect(loaded.map((p) => p.address)).toEqual([ '2.2.2.2:80', '3.3.3.3:80' ]);
        expect(loaded[0].validatedAt).toEqual(new Date('2024-04-03T00:00:00Z'));
    });
});
