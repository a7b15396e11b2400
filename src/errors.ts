export class ProxyFinderError extends Error {
    constructor(message: string) {
        super(`${ new.target.name }: ${ message }`);
        this.name = new.target.name;
    }
}

// One source failed or timed out. Absorbed by the fetcher, never surfaced.
export class SourceUnavailableError extends ProxyFinderError {
    public readonly source: string;

    constructor(source: string, reason: string) {
        super(`${ source } is unavailable (${ reason })`);
        this.source = source;
    }
}

export class ConfigurationError extends ProxyFinderError {}

export class ExhaustionError extends ProxyFinderError {
    public readonly attempts: number;
    public readonly requested: number;

    constructor(requested: number, attempts: number) {
        super(`failed to find ${ requested } valid ${ requested === 1 ? 'proxy' : 'proxies' } after ${ attempts } attempts`);
        this.requested = requested;
        this.attempts = attempts;
    }
}

export function errorMessage(e: unknown): string {
    if (e instanceof Error) return e.message.trim();

    return String(e);
}
