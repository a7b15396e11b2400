import { describe, expect, it } from 'vitest';
import {
    ConfigurationError,
    errorMessage,
    ExhaustionError,
    ProxyFinderError,
    SourceUnavailableError,
} from '~/errors';

describe('errors', () => {
    it('prefix messages with the class name', () => {
        const error = new ExhaustionError(3, 30);

        expect(error).toBeInstanceOf(ProxyFinderError);
        expect(error.name).toBe('ExhaustionError');
        expect(error.message).toBe('ExhaustionError: failed to find 3 valid proxies after 30 attempts');
        expect(error.requested).toBe(3);
        expect(error.attempts).toBe(30);
    });

    it('name the unavailable source', () => {
        const error = new SourceUnavailableError('geonode', 'empty response');

        expect(error.source).toBe('geonode');
        expect(error.message).toBe('SourceUnavailableError: geonode is unavailable (empty response)');
    });

    it('keep ConfigurationError distinct', () => {
        expect(new ConfigurationError('bad')).not.toBeInstanceOf(ExhaustionError);
        expect(new ConfigurationError('bad').message).toBe('ConfigurationError: bad');
    });

    it('read messages from anything thrown', () => {
        expect(errorMessage(new Error(' boom \n'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
    });
});
