/**
 * Fixed-offset layout of Boxer's Prolog output.
 *
 * Each discourse starts with an `id(<discourse id>,<drs id>).` line. The
 * `sem(<drs id>,` header sits four lines below it and the DRS term itself
 * eight lines below, terminated by `).`.
 */

import { createMalformedBatchLayoutError } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';

export interface TermBlock {
    discourseId: string;
    drsId: string;
    /** 0-based line of the `id(` marker */
    line: number;
    /** Term text with the `).` terminator removed */
    term: string;
}

function unquote(id: string): string {
    if (id.length >= 2 && id.startsWith("'") && id.endsWith("'")) {
        return id.slice(1, -1);
    }
    return id;
}

export function locateTermBlocks(rawOutput: string): TermBlock[] {
    const lines = rawOutput.split(/\r?\n/);
    const blocks: TermBlock[] = [];

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (!line.startsWith(DEFAULTS.idLinePrefix)) continue;

        const comma = line.indexOf(',');
        const close = comma < 0 ? -1 : line.indexOf(')', comma);
        if (comma < 0 || close < 0) {
            throw createMalformedBatchLayoutError('id line is not of the form id(<id>,<drs id>).', i, line);
        }
        const discourseId = unquote(line.slice(DEFAULTS.idLinePrefix.length, comma).trim());
        const drsId = line.slice(comma + 1, close).trim();

        const headerIndex = i + DEFAULTS.semHeaderOffset;
        const header = lines[headerIndex];
        const expectedHeader = `sem(${drsId},`;
        if (header === undefined || !header.startsWith(expectedHeader)) {
            throw createMalformedBatchLayoutError(`expected a line starting with '${expectedHeader}'`, headerIndex, header);
        }

        const termIndex = i + DEFAULTS.termOffset;
        const termLine = lines[termIndex]?.trimEnd();
        if (termLine === undefined || !termLine.endsWith(').')) {
            throw createMalformedBatchLayoutError("expected the DRS term line ending in ').'", termIndex, termLine);
        }

        blocks.push({
            discourseId,
            drsId,
            line: i,
            term: termLine.slice(0, -2).trim(),
        });
        i = termIndex;
    }

    return blocks;
}
