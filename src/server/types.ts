import type { RequestHandler } from 'express';

export type HttpMethod = 'get' | 'post' | 'put' | 'delete';

export interface Endpoint {
    path: string,
    method: HttpMethod,
    handler: RequestHandler,
    // Shown in the startup log.
    summary?: string,
}

// Body of every non-2xx answer.
export interface ErrorResponse {
    msg: string,
}
