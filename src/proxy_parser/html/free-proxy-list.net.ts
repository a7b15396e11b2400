import { JSDOM } from 'jsdom';
import type { SourceRecord } from '~/types';

/**
 * free-proxy-list.net table: ip, port, code, country, anonymity, google, https, last checked.
 */
export function parseFreeProxyListNet(page_string: string): SourceRecord[] {
    const page = new JSDOM(page_string);

    const table = page.window.document.querySelector('table');

    if (!table) throw new Error('proxy table not found');

    const proxies: SourceRecord[] = [];

    for (const tr of Array.from(table.querySelectorAll('tbody tr'))) {
        const tds = tr.querySelectorAll('td');

        if (tds.length < 5) continue;

        const ip = tds.item(0).textContent?.trim();
        const port = tds.item(1).textContent?.trim();

        if (!ip || !port) continue;

        proxies.push({
            address: `${ ip }:${ port }`,
            country: tds.item(2).textContent?.trim(),
            anonymity: tds.item(4).textContent?.trim(),
        });
    }

    return proxies;
}
