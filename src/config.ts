import appRootPath from 'app-root-path';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '~/errors';
import type { LogLevel } from '~/logger';

export const FILES_DIR = path.resolve(appRootPath.path, 'files');

export const PROXY_CACHE_FILE_PATH = path.resolve(FILES_DIR, 'proxy_cache.json');

const integer = (fallback: number, min: number = 1) => z.coerce.number().int().min(min).default(fallback);

const flag = (fallback: boolean) => z
.enum([ 'true', 'false', '1', '0', 'yes', 'no' ])
.default(fallback ? 'true' : 'false')
.transform((v) => v === 'true' || v === '1' || v === 'yes');

const SettingsSchema = z.object({
    PORT: integer(3000, 0),
    LOG_LEVEL: z.enum([ 'silent', 'error', 'warning', 'log' ]).default('log'),
    CACHE_FILE: z.string().min(1).default(PROXY_CACHE_FILE_PATH),
    CACHE_MAX_AGE_HOURS: z.coerce.number().positive().default(24),
    CACHE_CAPACITY: integer(500),
    MAX_RETRIES: integer(3),
    MAX_SOURCES: integer(8),
    MAX_CANDIDATES: integer(100),
    MAX_ATTEMPTS_PER_PROXY: integer(10),
    SOURCE_TIMEOUT_MS: integer(10000),
    FETCH_DEADLINE_MS: integer(30000),
    REACHABILITY_TIMEOUT_MS: integer(5000),
    PROBE_TIMEOUT_MS: integer(10000),
    VALIDATION_CONCURRENCY: integer(25),
    LENIENT_VALIDATION: flag(true),
});

export interface Settings {
    port: number,
    logLevel: LogLevel,
    cacheFile: string,
    cacheMaxAgeHours: number,
    cacheCapacity: number,
    maxRetries: number,
    maxSources: number,
    maxCandidates: number,
    maxAttemptsPerProxy: number,
    // milliseconds
    sourceTimeout: number,
    fetchDeadline: number,
    reachabilityTimeout: number,
    probeTimeout: number,
    validationConcurrency: number,
    lenientValidation: boolean,
}

/**
 * Reads settings from the environment. Missing values take their defaults,
 * empty strings count as missing.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const present = Object.fromEntries(
        Object.entries(env).filter(([ , value ]) => value !== undefined && value.trim() !== ''),
    );

    const parsed = SettingsSchema.safeParse(present);

    if (!parsed.success) {
        const issues = parsed.error.issues
        .map((issue) => `${ issue.path.join('.') }: ${ issue.message }`)
        .join('; ');

        throw new ConfigurationError(`invalid settings (${ issues })`);
    }

    const s = parsed.data;

    return {
        port: s.PORT,
        logLevel: s.LOG_LEVEL,
        cacheFile: path.resolve(appRootPath.path, s.CACHE_FILE),
        cacheMaxAgeHours: s.CACHE_MAX_AGE_HOURS,
        cacheCapacity: s.CACHE_CAPACITY,
        maxRetries: s.MAX_RETRIES,
        maxSources: s.MAX_SOURCES,
        maxCandidates: s.MAX_CANDIDATES,
        maxAttemptsPerProxy: s.MAX_ATTEMPTS_PER_PROXY,
        sourceTimeout: s.SOURCE_TIMEOUT_MS,
        fetchDeadline: s.FETCH_DEADLINE_MS,
        reachabilityTimeout: s.REACHABILITY_TIMEOUT_MS,
        probeTimeout: s.PROBE_TIMEOUT_MS,
        validationConcurrency: s.VALIDATION_CONCURRENCY,
        lenientValidation: s.LENIENT_VALIDATION,
    };
}
