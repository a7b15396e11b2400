import { createConnection } from 'net';
import type { ReachabilityResult } from '~/proxy_checker/types';

/**
 * Opens and immediately closes a TCP connection. Never rejects.
 */
export function probeReachability(host: string, port: number, timeout: number): Promise<ReachabilityResult> {
    return new Promise((resolve) => {
        const started = performance.now();
        const socket = createConnection({ host, port });

        const finish = (result: ReachabilityResult) => {
            socket.removeAllListeners();
            socket.on('error', () => undefined);
            socket.destroy();
            resolve(result);
        };

        socket.setTimeout(timeout);

        socket.once('connect', () => {
            finish({ reachable: true, seconds: (performance.now() - started) / 1000 });
        });

        socket.once('timeout', () => {
            finish({ reachable: false, reason: `no connection after ${ timeout }ms` });
        });

        socket.once('error', (e) => {
            finish({ reachable: false, reason: e.message });
        });
    });
}
