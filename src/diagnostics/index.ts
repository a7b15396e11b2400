import { promises as dns } from 'dns';
import * as os from 'os';
import { createDefaultEchoes } from '~/echo';
import type { Echo } from '~/echo/Echo';
import { errorMessage } from '~/errors';
import { Logger } from '~/logger';

export interface EndpointReport {
    name: string,
    url: string,
    working: boolean,
    status?: number,
    // seconds
    responseTime?: number,
    error?: string,
}

export interface NetworkInterfaceReport {
    name: string,
    address: string,
    netmask: string,
}

export interface DiagnosticsReport {
    timestamp: string,
    dns: {
        host: string,
        working: boolean,
        addresses: string[],
        error?: string,
    },
    endpoints: EndpointReport[],
    workingEndpoints: number,
    system: {
        platform: string,
        release: string,
        node: string,
        memoryUsagePercent: number,
        interfaces: NetworkInterfaceReport[],
    },
}

export interface DiagnosticsOptions {
    echoes?: Echo[],
    dnsHost?: string,
    // milliseconds
    timeout?: number,
    lookup?: (host: string) => Promise<string[]>,
}

/**
 * Checks the connection the validator relies on: DNS, the echo endpoints reached directly,
 * and a short description of the host.
 */
export class Diagnostics {
    public static DEFAULT_DNS_HOST = 'www.google.com';
    public static DEFAULT_TIMEOUT = 5000;

    private readonly _logger: Logger;
    private readonly _echoes: Echo[];
    private readonly _dnsHost: string;
    private readonly _timeout: number;
    private readonly _lookup: (host: string) => Promise<string[]>;

    constructor(options: DiagnosticsOptions = {}, logger: Logger = new Logger('Diagnostics')) {
        this._echoes = options.echoes ?? createDefaultEchoes();
        this._dnsHost = options.dnsHost ?? Diagnostics.DEFAULT_DNS_HOST;
        this._timeout = options.timeout ?? Diagnostics.DEFAULT_TIMEOUT;
        this._lookup = options.lookup ?? ((host) => dns.resolve4(host));
        this._logger = logger;
    }

    public async run(): Promise<DiagnosticsReport> {
        this._logger.log('Running diagnostics...');

        const [ dnsReport, endpoints ] = await Promise.all([
            this.checkDns(),
            this.checkEndpoints(),
        ]);

        const workingEndpoints = endpoints.filter((e) => e.working).length;

        const report: DiagnosticsReport = {
            timestamp: new Date().toISOString(),
            dns: dnsReport,
            endpoints,
            workingEndpoints,
            system: Diagnostics.systemInfo(),
        };

        if (!dnsReport.working) this._logger.error('DNS resolution failed:', dnsReport.error);

        if (workingEndpoints === 0) {
            this._logger.error('No test endpoint is reachable, validation will reject every proxy');
        } else {
            this._logger.happy(`${ workingEndpoints }/${ endpoints.length } test endpoints are reachable`);
        }

        return report;
    }

    public async checkDns(): Promise<DiagnosticsReport['dns']> {
        try {
            const addresses = await this._lookup(this._dnsHost);

            return { host: this._dnsHost, working: addresses.length > 0, addresses };
        } catch (e) {
            if (e instanceof Error) {
                return { host: this._dnsHost, working: false, addresses: [], error: errorMessage(e) };
            } else throw e;
        }
    }

    public checkEndpoints(): Promise<EndpointReport[]> {
        return Promise.all(this._echoes.map(async (echo): Promise<EndpointReport> => {
            const started = performance.now();

            try {
                // Direct, whatever proxy the environment names.
                const response = await echo.byHttp({ timeout: this._timeout, proxy: false });

                return {
                    name: echo.name,
                    url: echo.url,
                    working: response.status === 200,
                    status: response.status,
                    responseTime: +((performance.now() - started) / 1000).toFixed(3),
                };
            } catch (e) {
                if (e instanceof Error) {
                    return { name: echo.name, url: echo.url, working: false, error: errorMessage(e) };
                } else throw e;
            }
        }));
    }

    public static systemInfo(): DiagnosticsReport['system'] {
        const interfaces = Object.entries(os.networkInterfaces())
        .reduce<NetworkInterfaceReport[]>((acc, [ name, addresses ]) => {
            const ipv4 = addresses?.find((a) => a.family === 'IPv4');

            if (ipv4) acc.push({ name, address: ipv4.address, netmask: ipv4.netmask });

            return acc;
        }, []);

        return {
            platform: os.platform(),
            release: os.release(),
            node: process.version,
            memoryUsagePercent: +((1 - os.freemem() / os.totalmem()) * 100).toFixed(1),
            interfaces,
        };
    }
}
