import axios from 'axios';
import { errorMessage, SourceUnavailableError } from '~/errors';
import { common_headers } from '~/proxy_parser/common_headers';
import type { CountryCode, SourceRecord, SourceSpec } from '~/types';

export interface SourceFetchOptions {
    country?: CountryCode,
    // milliseconds
    timeout: number,
    signal?: AbortSignal,
}

/**
 * Turns one source into raw records, or throws `SourceUnavailableError`.
 * Must give up once `timeout` has passed or `signal` aborts.
 */
export interface SourceAdapter {
    fetch(spec: SourceSpec, options: SourceFetchOptions): Promise<SourceRecord[]>;
}

export class HttpSourceAdapter implements SourceAdapter {
    public async fetch(spec: SourceSpec, options: SourceFetchOptions): Promise<SourceRecord[]> {
        const url = spec.url(spec.countrySupported ? options.country : undefined);

        let body: string;

        try {
            body = await axios.get<string>(url, {
                headers: { ...common_headers, ...spec.headers },
                timeout: options.timeout,
                signal: options.signal,
                // Raw body, parsing belongs to the source.
                responseType: 'text',
            })
            .then((r) => r.data);
        } catch (e) {
            throw new SourceUnavailableError(spec.name, errorMessage(e));
        }

        if (!body || !body.trim()) {
            throw new SourceUnavailableError(spec.name, 'empty response');
        }

        try {
            return spec.parse(body);
        } catch (e) {
            throw new SourceUnavailableError(spec.name, `unparseable response: ${ errorMessage(e) }`);
        }
    }
}
