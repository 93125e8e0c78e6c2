import type { BatchOptions, DiscourseResultMap, DrsExpression } from '../types/index.js';
import { isLogicException } from '../types/errors.js';
import { batchOptionsSchema, discourseIdsSchema, validateOptions } from '../types/options.js';
import { parseDiscourse } from '../parser/index.js';
import { simplifyDiscourse } from '../logic/transform/simplify.js';
import { locateTermBlocks, TermBlock } from './layout.js';

/**
 * Split a batched Boxer output into discourses and parse each one.
 *
 * The result holds one entry per requested id, in request order. A discourse
 * missing from the output or failing to parse maps to `null`; a layout
 * violation aborts the whole batch.
 */
export function demultiplexAndParse(
    rawOutput: string,
    discourseIds: readonly string[],
    options: BatchOptions = {}
): DiscourseResultMap {
    const ids = validateOptions(discourseIdsSchema, discourseIds);
    const { occurIndex, useDiscourseIds } = validateOptions(batchOptionsSchema, options);

    const results: DiscourseResultMap = new Map();
    for (const id of ids) {
        results.set(id, null);
    }

    for (const block of locateTermBlocks(rawOutput)) {
        if (!results.has(block.discourseId)) continue;
        results.set(block.discourseId, parseBlock(block, occurIndex, useDiscourseIds));
    }

    return results;
}

function parseBlock(block: TermBlock, occurIndex: boolean, useDiscourseIds: boolean): DrsExpression | null {
    try {
        const drs = parseDiscourse(block.term, {
            occurIndex,
            discourseId: useDiscourseIds ? block.discourseId : undefined,
        });
        return simplifyDiscourse(drs);
    } catch (e) {
        if (!isLogicException(e)) throw e;
        console.warn(`Failed to parse discourse '${block.discourseId}' at line ${block.line + 1}: ${e.message}`);
        return null;
    }
}
