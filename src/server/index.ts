import bodyParser from 'body-parser';
import express, { type ErrorRequestHandler, type Express, type Request, type RequestHandler, type Response } from 'express';
import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import { ConfigurationError, errorMessage, ExhaustionError } from '~/errors';
import { Logger } from '~/logger';
import type { Endpoint, ErrorResponse } from '~/server/types';

export class Server {
    private readonly _instance: Express;
    private _logger: Logger;
    private _server: HttpServer | undefined;
    private readonly _port: number;

    private _isStarted: boolean = false;

    constructor(port: number) {
        this._instance = express();
        this._logger = new Logger('Server');
        this._port = port;

        this._instance.use(bodyParser.json());
        this._initEndpoints();
    }

    /**
     * Resolves with the bound port, which differs from the configured one when that was 0.
     */
    public start(): Promise<number> {
        if (this._isStarted && this._server) return Promise.resolve(Server._boundPort(this._server, this._port));

        this._instance.use(Server._errorHandler(this._logger.createChild('error')));

        return new Promise((resolve, reject) => {
            const server = this._instance.listen(this._port, () => {
                const port = Server._boundPort(server, this._port);

                this._logger.log(`The server is running on port ${ Logger.makeUnderline(port.toString()) }`);
                this._isStarted = true;
                resolve(port);
            });

            server.once('error', reject);
            this._server = server;
        });
    }

    public stop(): Promise<void> {
        const server = this._server;

        if (!this._isStarted || !server) return Promise.resolve();

        return new Promise((resolve, reject) => {
            server.close((e) => {
                this._isStarted = false;

                if (e) reject(e);
                else resolve();
            });
        });
    }

    /**
     * Rejections from async handlers reach the error handler, which maps them to a status.
     */
    public addEndpoint({ path, method, handler, summary }: Endpoint): void {
        const wrapped: RequestHandler = (req, res, next) => {
            Promise.resolve(handler(req, res, next)).catch(next);
        };

        this._instance[method](path, wrapped);
        this._logger.log(`Endpoint <${ method.toUpperCase() }> ${ path } enabled${ summary ? ` (${ summary })` : '' }`);
    }

    public static statusOf(e: unknown): number {
        if (e instanceof ConfigurationError) return 400;
        if (e instanceof ExhaustionError) return 503;

        // body-parser marks malformed bodies with a 4xx status.
        if (typeof e === 'object' && e !== null && 'status' in e && typeof e.status === 'number'
            && e.status >= 400 && e.status < 500) return e.status;

        return 500;
    }

    private static _boundPort(server: HttpServer, fallback: number): number {
        const address: string | AddressInfo | null = server.address();

        return address && typeof address === 'object' ? address.port : fallback;
    }

    private static _errorHandler(logger: Logger): ErrorRequestHandler {
        return (e: unknown, req, res, next) => {
            if (res.headersSent) {
                next(e);

                return;
            }

            const status = Server.statusOf(e);
            const body: ErrorResponse = { msg: errorMessage(e) };

            if (status === 500) logger.error(`<${ req.method }> ${ req.path }:`, body.msg);

            res.status(status);
            res.send(body);
        };
    }

    private _initEndpoints(): void {
        this._instance.get('/', (req: Request, res: Response) => {
            res.status(200);

            res.send('relay-finder is running');
        });
    }
}
