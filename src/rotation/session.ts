import { Cache } from '~/cache';
import type { ValidationOutcome } from '~/proxy_checker/types';
import type { ValidatedProxy } from '~/types';

/**
 * What one caller has learned so far: which addresses were looked at, which proved good,
 * which were handed out. Pass the same session to successive calls to rotate.
 */
export class RotationSession {
    private readonly _seen = new Set<string>();
    private readonly _rejected = new Set<string>();
    private readonly _served = new Set<string>();
    private readonly _validated: Cache<ValidatedProxy>;

    /**
     * @param ttl - milliseconds a validated proxy is trusted without a new probe
     */
    constructor(ttl: number = Infinity, now?: () => number) {
        this._validated = new Cache<ValidatedProxy>(ttl, now);
    }

    public markSeen(address: string): void {
        this._seen.add(address);
    }

    public isSeen(address: string): boolean {
        return this._seen.has(address);
    }

    public remember(outcome: ValidationOutcome): void {
        if (outcome.ok) {
            this._rejected.delete(outcome.proxy.address);
            this._validated.update(outcome.proxy.address, outcome.proxy);
        } else {
            this._rejected.add(outcome.address);
        }
    }

    public lookup(address: string): ValidatedProxy | undefined {
        return this._validated.get(address);
    }

    public wasRejected(address: string): boolean {
        return this._rejected.has(address);
    }

    public markServed(address: string): void {
        this._served.add(address);
    }

    public isServed(address: string): boolean {
        return this._served.has(address);
    }
}
