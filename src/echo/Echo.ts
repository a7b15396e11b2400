import axios, { type AxiosRequestConfig } from 'axios';

export interface EchoResponse {
    status: number,
    // The address the echo saw the request come from, when it says so.
    origin?: string,
}

/**
 * A small, low-risk endpoint used to prove that a relay forwards plain HTTP.
 * Every status is returned as is; only transport failures reject.
 */
export abstract class Echo {
    public abstract readonly name: string;

    private readonly _url: string;

    protected constructor(url: string) {
        this._url = url;
    }

    public get url(): string {
        return this._url;
    }

    public async byHttp(options?: AxiosRequestConfig): Promise<EchoResponse> {
        const response = await axios.get<string>(this._url, {
            ...options,
            responseType: 'text',
            validateStatus: () => true,
        });

        return {
            status: response.status,
            origin: response.status === 200 ? this._extractOrigin(String(response.data)) : undefined,
        };
    }

    protected abstract _extractOrigin(body: string): string | undefined;

    protected static _parseJson(body: string): unknown {
        try {
            return JSON.parse(body);
        } catch {
            return undefined;
        }
    }
}
