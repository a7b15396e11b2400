import { describe, expect, it } from 'vitest';
import { RotationSession } from '~/rotation';
import { validated } from './helpers';

describe('RotationSession', () => {
    it('remembers validated proxies and rejections', () => {
        const session = new RotationSession();

        session.remember({ ok: true, proxy: validated('1.1.1.1:80') });
        session.remember({ ok: false, address: '2.2.2.2:80', reason: 'unreachable' });

        expect(session.lookup('1.1.1.1:80')?.address).toBe('1.1.1.1:80');
        expect(session.wasRejected('2.2.2.2:80')).toBe(true);
        expect(session.lookup('2.2.2.2:80')).toBeUndefined();
    });

    it('clears a rejection when the address later validates', () => {
        const session = new RotationSession();

        session.remember({ ok: false, address: '1.1.1.1:80', reason: 'non-functional' });
        session.remember({ ok: true, proxy: validated('1.1.1.1:80') });

        expect(session.wasRejected('1.1.1.1:80')).toBe(false);
    });

    it('forgets validated proxies after the ttl', () => {
        let now = 0;
        const session = new RotationSession(1000, () => now);

        session.remember({ ok: true, proxy: validated('1.1.1.1:80') });
        now = 1001;

        expect(session.lookup('1.1.1.1:80')).toBeUndefined();
    });

    it('tracks seen and served addresses separately', () => {
        const session = new RotationSession();

        session.markSeen('1.1.1.1:80');
        session.markServed('2.2.2.2:80');

        expect(session.isSeen('1.1.1.1:80')).toBe(true);
        expect(session.isServed('1.1.1.1:80')).toBe(false);
        expect(session.isServed('2.2.2.2:80')).toBe(true);
    });
});
