import type { Echo } from '~/echo/Echo';
import { ExampleComEcho } from '~/echo/example-com.echo';
import { HttpbinEcho } from '~/echo/httpbin.echo';
import { IfconfigMeEcho } from '~/echo/ifconfig-me.echo';
import { IpApiEcho } from '~/echo/ip-api.echo';

// Tried in this order, the first 200 wins.
export function createDefaultEchoes(): Echo[] {
    return [
        new HttpbinEcho(),
        new IpApiEcho(),
        new IfconfigMeEcho(),
        new ExampleComEcho(),
    ];
}
