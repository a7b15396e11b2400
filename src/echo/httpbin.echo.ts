import { z } from 'zod';
import { Echo } from '~/echo/Echo';

const HttpbinIpResponse = z.object({
    origin: z.string(),
});

export class HttpbinEcho extends Echo {
    public readonly name = 'httpbin';

    constructor(url: string = 'http://httpbin.org/ip') {
        super(url);
    }

    protected _extractOrigin(body: string): string | undefined {
        const parsed = HttpbinIpResponse.safeParse(Echo._parseJson(body));

        return parsed.success ? parsed.data.origin : undefined;
    }
}
