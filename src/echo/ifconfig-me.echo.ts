import { Echo } from '~/echo/Echo';

// Answers with the bare address.
export class IfconfigMeEcho extends Echo {
    public readonly name = 'ifconfig.me';

    constructor(url: string = 'http://ifconfig.me/ip') {
        super(url);
    }

    protected _extractOrigin(body: string): string | undefined {
        const ip = body.trim();

        return ip && ip.length < 40 && !/\s/.test(ip) ? ip : undefined;
    }
}
