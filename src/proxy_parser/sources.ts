import { parseGeonode } from '~/proxy_parser/api/geonode';
import { parseFreeProxyListNet } from '~/proxy_parser/html/free-proxy-list.net';
import { parseTextList } from '~/proxy_parser/text/text-list';
import type { SourceSpec } from '~/types';

export const DEFAULT_SOURCES: SourceSpec[] = [
    {
        name: 'github-clarketm',
        countrySupported: false,
        priority: 1,
        url: () => 'https://raw.githubusercontent.com/clarketm/proxy-list/master/proxy-list-raw.txt',
        parse: parseTextList,
    },
    {
        name: 'github-speedx',
        countrySupported: false,
        priority: 1,
        url: () => 'https://raw.githubusercontent.com/TheSpeedX/PROXY-List/master/http.txt',
        parse: parseTextList,
    },
    {
        name: 'github-monosans',
        countrySupported: false,
        priority: 1,
        url: () => 'https://raw.githubusercontent.com/monosans/proxy-list/main/proxies/http.txt',
        parse: parseTextList,
    },
    {
        name: 'proxyscrape',
        countrySupported: true,
        priority: 2,
        url: (country) => 'https://api.proxyscrape.com/v2/?request=getproxies&protocol=http&timeout=10000'
            + `&country=${ country ?? 'all' }&ssl=all&anonymity=all`,
        parse: parseTextList,
    },
    {
        name: 'geonode',
        countrySupported: true,
        priority: 2,
        url: (country) => 'https://proxylist.geonode.com/api/proxy-list?limit=500&page=1&sort_by=lastChecked&sort_type=desc'
            + '&protocols=http%2Chttps'
            + (country ? `&country=${ country }` : ''),
        parse: parseGeonode,
        headers: { 'Accept': 'application/json' },
    },
    {
        name: 'free-proxy-list.net',
        countrySupported: false,
        priority: 3,
        url: () => 'https://free-proxy-list.net/',
        parse: parseFreeProxyListNet,
    },
];
