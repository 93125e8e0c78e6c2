/**
 * Submission protocol for a batch of discourses.
 *
 * Every discourse is announced by a `<META>'<id>'` line followed by one line
 * per sentence. Ids default to the discourse's 0-based position in the batch.
 */

import { createInvalidOptionsError } from '../types/errors.js';
import { discourseIdsSchema, validateOptions } from '../types/options.js';

export interface DiscourseBatch {
    ids: string[];
    /** True when the caller supplied the ids; only then are they embedded in predicate names */
    useDiscourseIds: boolean;
}

export function resolveDiscourseIds(count: number, ids?: readonly string[]): DiscourseBatch {
    if (ids === undefined) {
        return {
            ids: Array.from({ length: count }, (_, i) => String(i)),
            useDiscourseIds: false,
        };
    }
    if (ids.length !== count) {
        throw createInvalidOptionsError([`expected ${count} discourse ids but got ${ids.length}`]);
    }
    return { ids: validateOptions(discourseIdsSchema, ids), useDiscourseIds: true };
}

export function formatBatchInput(discourses: readonly (readonly string[])[], ids: readonly string[]): string {
    if (discourses.length !== ids.length) {
        throw createInvalidOptionsError([`expected ${discourses.length} discourse ids but got ${ids.length}`]);
    }
    const lines: string[] = [];
    discourses.forEach((sentences, i) => {
        lines.push(`<META>'${ids[i]}'`, ...sentences);
    });
    return lines.join('\n');
}
