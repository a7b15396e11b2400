import type { CandidateProxy, ValidatedProxy } from '~/types';

export type InvalidReason = 'malformed' | 'unreachable' | 'non-functional';

export type ValidationOutcome =
    | { ok: true, proxy: ValidatedProxy }
    | { ok: false, address: string, reason: InvalidReason };

export interface CandidateValidator {
    validate(candidate: CandidateProxy): Promise<ValidationOutcome>;
}

export type ReachabilityResult =
    | { reachable: true, seconds: number }
    | { reachable: false, reason: string };

export type FunctionalProbeResult =
    | { kind: 'ok', seconds: number, echo: string, origin?: string }
    | { kind: 'auth-required', seconds: number, echo: string }
    | { kind: 'failed', errors: string[] };
