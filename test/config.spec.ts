import { describe, expect, it } from 'vitest';
import { loadSettings, PROXY_CACHE_FILE_PATH } from '~/config';
import { ConfigurationError } from '~/errors';

describe('loadSettings', () => {
    it('fills in defaults', () => {
        expect(loadSettings({})).toEqual({
            port: 3000,
            logLevel: 'log',
            cacheFile: PROXY_CACHE_FILE_PATH,
            cacheMaxAgeHours: 24,
            cacheCapacity: 500,
            maxRetries: 3,
            maxSources: 8,
            maxCandidates: 100,
            maxAttemptsPerProxy: 10,
            sourceTimeout: 10000,
            fetchDeadline: 30000,
            reachabilityTimeout: 5000,
            probeTimeout: 10000,
            validationConcurrency: 25,
            lenientValidation: true,
        });
    });

    it('coerces values from strings', () => {
        const settings = loadSettings({
            PORT: '8080',
            LOG_LEVEL: 'warning',
            MAX_RETRIES: '5',
            CACHE_MAX_AGE_HOURS: '0.5',
            LENIENT_VALIDATION: 'false',
        });

        expect(settings).toMatchObject({
            port: 8080,
            logLevel: 'warning',
            maxRetries: 5,
            cacheMaxAgeHours: 0.5,
            lenientValidation: false,
        });
    });

    it('treats empty values as missing', () => {
        expect(loadSettings({ PORT: '', MAX_RETRIES: '  ' })).toMatchObject({ port: 3000, maxRetries: 3 });
    });

    it('rejects bad values', () => {
        expect(() => loadSettings({ MAX_RETRIES: '0' })).toThrow(ConfigurationError);
        expect(() => loadSettings({ MAX_RETRIES: '0' })).toThrow('MAX_RETRIES');
        expect(() => loadSettings({ LOG_LEVEL: 'loud' })).toThrow('LOG_LEVEL');
        expect(() => loadSettings({ PORT: 'abc' })).toThrow('PORT');
        expect(() => loadSettings({ LENIENT_VALIDATION: 'maybe' })).toThrow('LENIENT_VALIDATION');
    });
});
