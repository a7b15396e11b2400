import { describe, expect, it } from 'vitest';
import {
    addressToAxiosProxy,
    deleteDuplicates,
    divideArrayIntoBatches,
    isValidAddress,
    normalizeAnonymity,
    parseAddress,
    runPool,
    sample,
    withDeadline,
} from '~/utils';

describe('parseAddress', () => {
    it('splits a valid address', () => {
        expect(parseAddress(' 1.2.3.4:8080 ')).toEqual({ host: '1.2.3.4', port: 8080 });
        expect(parseAddress('255.255.255.255:65535')).toEqual({ host: '255.255.255.255', port: 65535 });
        expect(parseAddress('0.0.0.0:1')).toEqual({ host: '0.0.0.0', port: 1 });
    });

    it('rejects malformed addresses', () => {
        for (const bad of [
            '256.1.1.1:80',
            '1.2.3:80',
            '01.2.3.4:80',
            '010.0.0.1:80',
            '1.2.3.4',
            '1.2.3.4:0',
            '1.2.3.4:65536',
            '1.2.3.4:080',
            'example.com:80',
            '',
        ]) {
            expect(isValidAddress(bad), bad).toBe(false);
        }
    });
});

describe('addressToAxiosProxy', () => {
    it('builds a plain http proxy config', () => {
        expect(addressToAxiosProxy('10.0.0.1:3128')).toEqual({ protocol: 'http', host: '10.0.0.1', port: 3128 });
    });

    it('throws on anything else', () => {
        expect(() => addressToAxiosProxy('nope')).toThrow('address nope is not ip:port');
    });
});

describe('normalizeAnonymity', () => {
    it('maps the spellings sources use', () => {
        expect(normalizeAnonymity('elite proxy')).toBe('elite');
        expect(normalizeAnonymity('High Anonymous')).toBe('elite');
        expect(normalizeAnonymity('HIA')).toBe('elite');
        expect(normalizeAnonymity('anonymous')).toBe('anonymous');
        expect(normalizeAnonymity('ANM')).toBe('anonymous');
        expect(normalizeAnonymity('transparent')).toBe('transparent');
        expect(normalizeAnonymity('NOA')).toBe('transparent');
        expect(normalizeAnonymity('whatever')).toBe('unknown');
        expect(normalizeAnonymity(undefined)).toBe('unknown');
    });
});

describe('deleteDuplicates', () => {
    it('keeps the first occurrence', () => {
        const items = [ { k: 'a', v: 1 }, { k: 'b', v: 2 }, { k: 'a', v: 3 } ];

        expect(deleteDuplicates(items, (i) => i.k)).toEqual([ { k: 'a', v: 1 }, { k: 'b', v: 2 } ]);
    });
});

describe('divideArrayIntoBatches', () => {
    it('splits with a short tail', () => {
        expect(divideArrayIntoBatches([ 1, 2, 3, 4, 5 ], 2)).toEqual([ [ 1, 2 ], [ 3, 4 ], [ 5 ] ]);
        expect(divideArrayIntoBatches([], 3)).toEqual([]);
    });
});

describe('runPool', () => {
    it('never runs more than `size` workers at once', async () => {
        let running = 0;
        let peak = 0;
        const done: number[] = [];

        await runPool([ 1, 2, 3, 4, 5, 6, 7 ], 3, async (item) => {
            running++;
            peak = Math.max(peak, running);
            await new Promise((resolve) => setTimeout(resolve, 5));
            done.push(item);
            running--;
        });

        expect(peak).toBe(3);
        expect(done.sort()).toEqual([ 1, 2, 3, 4, 5, 6, 7 ]);
    });

    it('starts nothing new once stopped', async () => {
        const started: number[] = [];

        await runPool([ 1, 2, 3, 4 ], 1, async (item) => {
            started.push(item);
        }, () => started.length >= 2);

        expect(started).toEqual([ 1, 2 ]);
    });

    it('rejects when a worker throws', async () => {
        await expect(runPool([ 1 ], 1, async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');
    });
});

describe('withDeadline', () => {
    it('resolves with the value when in time', async () => {
        await expect(withDeadline(Promise.resolve(1), 50, () => 2)).resolves.toBe(1);
    });

    it('falls back when the promise is too slow', async () => {
        const slow = new Promise<number>((resolve) => setTimeout(() => resolve(1), 200));

        await expect(withDeadline(slow, 10, () => 2)).resolves.toBe(2);
    });
});

describe('sample', () => {
    it('picks distinct items', () => {
        const picked = sample([ 1, 2, 3, 4, 5 ], 3, () => 0);

        expect(picked).toEqual([ 1, 2, 3 ]);
    });

    it('returns everything when asked for more than there is', () => {
        expect(sample([ 1, 2 ], 5, () => 0.99).sort()).toEqual([ 1, 2 ]);
    });
});
