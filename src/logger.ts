import chalk from 'chalk';
import { inspect } from 'util';

export type LogLevel = 'silent' | 'error' | 'warning' | 'log';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warning: 2,
    log: 3,
};

export class Logger {
    protected static _chalk: chalk.Chalk = new chalk.Instance({ level: 1 });
    private static _level: LogLevel = 'log';

    private readonly _location_value: string;

    protected get _location(): string {
        return this._location_value;
    }

    protected _previousLocations: string[];

    protected get _fullLocation(): string[] {
        return this._previousLocations.concat(this._location);
    }

    constructor(location: string, previousLocations: string[] = []) {
        this._location_value = location;
        this._previousLocations = previousLocations;
    }

    public static setLevel(level: LogLevel): void {
        Logger._level = level;
    }

    public static makeUnderline(message: string): string {
        return Logger._chalk.underline(message);
    }

    public createChild(location: string): Logger {
        return new Logger(location, this._fullLocation);
    }

    public createCounter(max: number): LoggerCounter {
        return new LoggerCounter(this._fullLocation, max);
    }

    public log(...messages: unknown[]): void {
        if (!Logger._enabled('log')) return;

        Logger._log(this._fullLocation, messages);
    }

    public error(...messages: unknown[]): void {
        if (!Logger._enabled('error')) return;

        Logger._log(this._fullLocation, messages, Logger._chalk.redBright);
    }

    public happy(...messages: unknown[]): void {
        if (!Logger._enabled('log')) return;

        Logger._log(this._fullLocation, messages, Logger._chalk.greenBright);
    }

    public warning(...messages: unknown[]): void {
        if (!Logger._enabled('warning')) return;

        Logger._log(this._fullLocation, messages, Logger._chalk.yellow);
    }

    private static _enabled(level: LogLevel): boolean {
        return LEVEL_WEIGHT[Logger._level] >= LEVEL_WEIGHT[level];
    }

    protected static _log(locations: string | string[], messages: unknown[], colorFn?: chalk.ChalkFunction): void {
        const _messages = messages.map((m) => {
            let msg = typeof m === 'string' ? m : String(m);

            if (typeof m === 'object' && m !== null) {
                msg = inspect(m, {
                    depth: 2,
                });
            }

            if (colorFn) {
                msg = colorFn(msg);
            }

            return msg;
        });

        let _location: string;

        if (typeof locations === 'string') _location = `[${ locations }]`;
        else {
            _location = locations.reduce((acc, item) => {
                return item ? acc + `[${ item }]` : acc;
            }, '');
        }

        console.log(`${ _location }: ${ _messages.join(' ') }`);
    }
}

class LoggerCounter extends Logger {
    private _count: number;
    private readonly _max: number;

    constructor(previousLocations: string[], max: number) {
        super('', previousLocations);

        this._count = 0;
        this._max = max;
    }

    protected override get _location() {
        return `${ ++this._count }/${ this._max }`;
    }
}
