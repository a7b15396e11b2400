import type { SourceRecord } from '~/types';

/**
 * One `ip:port` per line; blank lines and `#` comments are skipped.
 * Syntax is not checked here, the filter does that.
 */
export function parseTextList(body: string): SourceRecord[] {
    return body
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
    .map((line) => ({ address: line }));
}
