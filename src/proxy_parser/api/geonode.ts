import { z } from 'zod';
import type { SourceRecord } from '~/types';

const GeonodeItem = z.object({
    ip: z.string(),
    port: z.union([ z.string(), z.number() ]),
    country: z.string().optional(),
    country_code: z.string().optional(),
    anonymityLevel: z.string().optional(),
    anonymity: z.string().optional(),
});

const GeonodeResponse = z.object({
    data: z.array(z.unknown()),
});

/**
 * proxylist.geonode.com JSON payload. Items that do not look like proxies are skipped,
 * a payload without `data` throws.
 */
export function parseGeonode(body: string): SourceRecord[] {
    const { data } = GeonodeResponse.parse(JSON.parse(body));

    return data.reduce<SourceRecord[]>((acc, raw) => {
        const item = GeonodeItem.safeParse(raw);

        if (!item.success) return acc;

        acc.push({
            address: `${ item.data.ip.trim() }:${ String(item.data.port).trim() }`,
            country: item.data.country_code ?? item.data.country,
            anonymity: item.data.anonymityLevel ?? item.data.anonymity,
        });

        return acc;
    }, []);
}
