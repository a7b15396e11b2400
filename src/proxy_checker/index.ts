import { errorMessage } from '~/errors';
import type { Echo } from '~/echo/Echo';
import { createDefaultEchoes } from '~/echo';
import { Logger } from '~/logger';
import { probeReachability } from '~/proxy_checker/reachability';
import type {
    CandidateValidator,
    FunctionalProbeResult,
    InvalidReason,
    ValidationOutcome,
} from '~/proxy_checker/types';
import type { Anonymity, CandidateProxy, ValidatedProxy } from '~/types';
import { addressToAxiosProxy, parseAddress } from '~/utils';

export interface ValidatorOptions {
    // milliseconds, phase A
    reachabilityTimeout: number,
    // milliseconds, per echo request in phase B
    probeTimeout: number,
    // Keep reachable proxies that failed every functional probe, as `unvalidated`.
    lenient: boolean,
    echoes?: Echo[],
}

export class ProxyValidator implements CandidateValidator {
    // Reported for proxies that never answered a functional probe; sorts them last.
    public static UNVALIDATED_LATENCY = 999.99;

    // seconds
    public static ELITE_MAX_LATENCY = 2;
    public static ANONYMOUS_MAX_LATENCY = 5;

    private readonly _logger: Logger;
    private readonly _options: ValidatorOptions;
    private readonly _echoes: Echo[];

    constructor(options: ValidatorOptions, logger: Logger = new Logger('ProxyValidator')) {
        this._options = options;
        this._echoes = options.echoes ?? createDefaultEchoes();
        this._logger = logger;
    }

    /**
     * Approximates the anonymity tier from latency alone, for sources that did not say.
     * This is a heuristic standing in for header inspection, not a measurement.
     */
    public static inferAnonymity(latencySeconds: number | null): Anonymity {
        if (latencySeconds === null) return 'transparent';
        if (latencySeconds < ProxyValidator.ELITE_MAX_LATENCY) return 'elite';
        if (latencySeconds < ProxyValidator.ANONYMOUS_MAX_LATENCY) return 'anonymous';

        return 'transparent';
    }

    /**
     * Phase A: raw TCP connect. Phase B: GET the echoes through the proxy, first 200 wins.
     */
    public async validate(candidate: CandidateProxy): Promise<ValidationOutcome> {
        const address = candidate.address;
        const parsed = parseAddress(address);

        if (!parsed) return ProxyValidator._invalid(address, 'malformed');

        const reach = await probeReachability(parsed.host, parsed.port, this._options.reachabilityTimeout);

        if (!reach.reachable) {
            this._logger.error(`Proxy ${ Logger.makeUnderline(address) } is unreachable:`, reach.reason);

            return ProxyValidator._invalid(address, 'unreachable');
        }

        const probe = await this.probeFunctional(address);

        if (probe.kind === 'failed' && !this._options.lenient) {
            this._logger.error(`Proxy ${ Logger.makeUnderline(address) } does not forward traffic`);

            return ProxyValidator._invalid(address, 'non-functional');
        }

        const latencySeconds = probe.kind === 'failed'
            ? ProxyValidator.UNVALIDATED_LATENCY
            : +probe.seconds.toFixed(3);

        const anonymity = candidate.anonymityHint !== 'unknown'
            ? candidate.anonymityHint
            : ProxyValidator.inferAnonymity(probe.kind === 'failed' ? null : latencySeconds);

        const proxy: ValidatedProxy = {
            address,
            country: candidate.countryHint,
            anonymity,
            latencySeconds,
            requiresAuth: probe.kind === 'auth-required',
            status: probe.kind === 'failed' ? 'unvalidated' : 'valid',
            validatedAt: new Date(),
            ...(probe.kind === 'ok' && probe.origin ? { exitIp: probe.origin } : {}),
        };

        if (proxy.status === 'valid') {
            this._logger.happy(`Proxy ${ Logger.makeUnderline(address) } is working (${ latencySeconds }s)`);
        } else {
            this._logger.warning(`Proxy ${ Logger.makeUnderline(address) } is reachable but unproven`);
        }

        return { ok: true, proxy };
    }

    /**
     * Tries every echo in order through the proxy. A 407 ends probing: the proxy works
     * but wants credentials.
     */
    public async probeFunctional(address: string): Promise<FunctionalProbeResult> {
        const proxy = addressToAxiosProxy(address);
        const errors: string[] = [];

        for (const echo of this._echoes) {
            const started = performance.now();

            try {
                const response = await echo.byHttp({
                    proxy,
                    timeout: this._options.probeTimeout,
                });

                const seconds = (performance.now() - started) / 1000;

                if (response.status === 407) {
                    return { kind: 'auth-required', seconds, echo: echo.name };
                }

                if (response.status === 200) {
                    return { kind: 'ok', seconds, echo: echo.name, origin: response.origin };
                }

                errors.push(`${ echo.name }: status ${ response.status }`);
            } catch (e) {
                if (e instanceof Error) {
                    errors.push(`${ echo.name }: ${ errorMessage(e) }`);
                } else throw e;
            }
        }

        return { kind: 'failed', errors };
    }

    private static _invalid(address: string, reason: InvalidReason): ValidationOutcome {
        return { ok: false, address, reason };
    }
}
