/**
 * Predicate Naming Utilities
 *
 * Builds canonical predicate identifiers that carry linguistic provenance:
 *
 *   <pos>_<lemma>_[<discourse id>_][s<sentence>_w<word>_]<arity>
 *
 * Positions are the decoded index values: the verb 'see' at index 4005
 * (sentence 3, word 4 after decoding) in discourse 't', occurrence indexed,
 * becomes `v_see_t_s3_w4_2`.
 */

import type { OccurrenceIndex } from '../types/parser.js';
import { createInvalidArityError } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';

export interface PredicateParts {
    pos: string;
    lemma: string;
    indices: readonly OccurrenceIndex[];
    arity: number;
    discourseId?: string;
    occurIndex?: boolean;
}

/**
 * Strip every character that is not an ASCII letter, digit, or underscore.
 */
export function sanitizeName(name: string): string {
    return name.replace(/[^A-Za-z0-9_]/g, '');
}

/**
 * Decode a Boxer position index: n = 1000 * (sentence + 1) + (word + 1)
 */
export function decodeIndex(n: number): OccurrenceIndex {
    return {
        sentence: Math.floor(n / 1000) - 1,
        word: (n % 1000) - 1,
    };
}

export function encodeIndex(index: OccurrenceIndex): number {
    return 1000 * (index.sentence + 1) + (index.word + 1);
}

/**
 * Rewrite tool-internal variables (`_G123`) to the stable `z` prefix.
 */
export function makeVariable(name: string): string {
    if (name.startsWith(DEFAULTS.internalVariablePrefix)) {
        return DEFAULTS.variablePrefix + name.slice(DEFAULTS.internalVariablePrefix.length);
    }
    return name;
}

export function buildPredicate(parts: PredicateParts): string {
    const { lemma, indices, arity, discourseId, occurIndex = false } = parts;
    if (!Number.isInteger(arity) || arity <= 0) {
        throw createInvalidArityError(arity, lemma);
    }

    const anchored = indices.length > 0;
    // Predicates without a textual anchor are shared across discourses
    const pos = anchored ? parts.pos : 'r';
    const discourse = discourseId && anchored ? `${discourseId}_` : '';
    const first = indices[0];
    const position = occurIndex && first ? `s${first.sentence}_w${first.word}_` : '';

    return `${pos}_${sanitizeName(lemma)}_${discourse}${position}${arity}`;
}

/**
 * Fixed-name relation predicate, e.g. relationName('agent', 2) = 'r_agent_2'.
 */
export function relationName(name: string, arity: number, pos: string = 'r'): string {
    if (!Number.isInteger(arity) || arity <= 0) {
        throw createInvalidArityError(arity, name);
    }
    return `${pos}_${sanitizeName(name)}_${arity}`;
}

/**
 * Read the trailing arity back from a canonical predicate name.
 */
export function parsePredicateArity(predicate: string): number | undefined {
    const match = /_(\d+)$/.exec(predicate);
    return match ? Number(match[1]) : undefined;
}
