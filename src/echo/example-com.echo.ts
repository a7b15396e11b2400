import { Echo } from '~/echo/Echo';

export class ExampleComEcho extends Echo {
    public readonly name = 'example.com';

    constructor(url: string = 'http://example.com/') {
        super(url);
    }

    protected _extractOrigin(): undefined {
        return undefined;
    }
}
