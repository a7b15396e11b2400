import { z } from 'zod';
import { Echo } from '~/echo/Echo';

const IpApiResponse = z.object({
    query: z.string(),
});

export class IpApiEcho extends Echo {
    public readonly name = 'ip-api';

    constructor(url: string = 'http://ip-api.com/json') {
        super(url);
    }

    protected _extractOrigin(body: string): string | undefined {
        const parsed = IpApiResponse.safeParse(Echo._parseJson(body));

        return parsed.success ? parsed.data.query : undefined;
    }
}
