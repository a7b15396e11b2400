import type { RequestHandler } from 'express';
import { z } from 'zod';
import { ConfigurationError } from '~/errors';
import type { ValidationOutcome } from '~/proxy_checker/types';
import type { ProxyFinder } from '~/proxy_finder';
import type { Endpoint } from '~/server/types';
import { runPool } from '~/utils';

const CheckBody = z.array(z.string()).min(1);

function queryString(value: unknown): string | undefined {
    if (typeof value === 'string') return value.trim() || undefined;
    if (Array.isArray(value) && typeof value[0] === 'string') return queryString(value[0]);

    return undefined;
}

function queryList(value: unknown): string[] | undefined {
    return queryString(value)?.split(',').map((s) => s.trim()).filter(Boolean);
}

function queryInteger(name: string, value: unknown): number | undefined {
    const raw = queryString(value);

    if (raw === undefined) return undefined;

    if (!/^\d+$/.test(raw)) throw new ConfigurationError(`${ name } must be a positive integer, got "${ raw }"`);

    return +raw;
}

export class ProxyFinderController {
    private readonly _finder: ProxyFinder;
    private readonly _checkConcurrency: number;

    constructor(finder: ProxyFinder, checkConcurrency: number) {
        this._finder = finder;
        this._checkConcurrency = checkConcurrency;
    }

    public getEndpoints(): Endpoint[] {
        return [
            {
                path: '/proxy',
                summary: 'one validated proxy',
                method: 'get',
                handler: this._getProxyEndpointHandler,
            }, {
                path: '/proxies',
                summary: 'n validated proxies',
                method: 'get',
                handler: this._getProxiesEndpointHandler,
            }, {
                path: '/candidates',
                summary: 'unvalidated candidates',
                method: 'get',
                handler: this._getCandidatesEndpointHandler,
            }, {
                path: '/check',
                summary: 'validate addresses',
                method: 'post',
                handler: this._checkEndpointHandler,
            }, {
                path: '/countries',
                summary: 'known country codes',
                method: 'get',
                handler: this._getCountriesEndpointHandler,
            }, {
                path: '/diagnostics',
                summary: 'connectivity self-check',
                method: 'get',
                handler: this._getDiagnosticsEndpointHandler,
            },
        ];
    }

    private _getProxyEndpointHandler: RequestHandler = async (req, res) => {
        const proxy = await this._finder.getOne({
            countries: queryList(req.query.countries),
            anonymity: queryString(req.query.anonymity),
        });

        res.status(200);
        res.send(proxy);
    };

    private _getProxiesEndpointHandler: RequestHandler = async (req, res) => {
        const proxies = await this._finder.getMany(queryInteger('n', req.query.n) ?? 1, {
            countries: queryList(req.query.countries),
            anonymity: queryString(req.query.anonymity),
        });

        res.status(200);
        res.send(proxies);
    };

    private _getCandidatesEndpointHandler: RequestHandler = async (req, res) => {
        const candidates = await this._finder.fetchCandidates({
            maxCount: queryInteger('max', req.query.max),
            countries: queryList(req.query.countries),
        });

        res.status(200);
        res.send(candidates);
    };

    private _checkEndpointHandler: RequestHandler<{}, unknown, unknown> = async (req, res) => {
        const body = CheckBody.safeParse(req.body);

        if (!body.success) throw new ConfigurationError('body must be a non-empty array of "ip:port" strings');

        const result: ValidationOutcome[] = [];

        await runPool(body.data, this._checkConcurrency, async (address, index) => {
            result[index] = await this._finder.validate(address);
        });

        res.status(200);
        res.send(result);
    };

    private _getCountriesEndpointHandler: RequestHandler = (req, res) => {
        res.status(200);
        res.send(this._finder.countries());
    };

    private _getDiagnosticsEndpointHandler: RequestHandler = async (req, res) => {
        res.status(200);
        res.send(await this._finder.diagnostics());
    };
}
