/**
 * Discourse Representation Structure (DRS) expression types
 */

export type DrsNodeType =
    | 'drs'
    | 'not'
    | 'or'
    | 'implies'
    | 'concat'
    | 'equals'
    | 'atom';

/**
 * A box introducing referents and a conjunction of conditions.
 * Referent and condition order follows the source term.
 */
export interface Drs {
    type: 'drs';
    referents: readonly string[];
    conditions: readonly DrsExpression[];
}

export interface Negation {
    type: 'not';
    operand: DrsExpression;
}

/**
 * `concat` models box merging; `merge` and `smerge` both produce it.
 */
export interface BinaryDrsExpression {
    type: 'or' | 'implies' | 'concat';
    left: DrsExpression;
    right: DrsExpression;
}

export interface Equality {
    type: 'equals';
    left: string;
    right: string;
}

/**
 * An n-ary relation, equivalent to the curried application of
 * `predicate` to each argument in turn.
 */
export interface Atom {
    type: 'atom';
    predicate: string;
    args: readonly string[];
}

export type DrsExpression = Drs | Negation | BinaryDrsExpression | Equality | Atom;

/**
 * Parsed discourses keyed by discourse id, in request order.
 * `null` marks a discourse that was missing from the output or failed to parse.
 */
export type DiscourseResultMap = Map<string, DrsExpression | null>;
