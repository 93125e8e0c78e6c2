/**
 * First-order translation of DRS expressions
 *
 * - A box is the existential closure of the conjunction of its conditions.
 * - An implication whose antecedent is a box universally quantifies the
 *   antecedent's referents: ([x],[A]) -> B  =>  all x (A -> B).
 * - Box concatenation is conjunction.
 * - Arguments bound by an enclosing referent are variables; all other
 *   arguments (names, dates, cardinalities) are constants.
 */

import type { Drs, DrsExpression, FolNode, FolTerm } from '../../types/index.js';

const TRUE: FolNode = { type: 'true' };

export function toFol(node: DrsExpression, bound: ReadonlySet<string> = new Set()): FolNode {
    switch (node.type) {
        case 'drs':
            return boxToFol(node, bound);

        case 'not':
            return { type: 'not', operand: toFol(node.operand, bound) };

        case 'or':
            return { type: 'or', left: toFol(node.left, bound), right: toFol(node.right, bound) };

        case 'implies':
            if (node.left.type === 'drs') {
                return boxToFol(node.left, bound, node.right);
            }
            return { type: 'implies', left: toFol(node.left, bound), right: toFol(node.right, bound) };

        case 'concat':
            return { type: 'and', left: toFol(node.left, bound), right: toFol(node.right, bound) };

        case 'equals':
            return { type: 'equals', left: toTerm(node.left, bound), right: toTerm(node.right, bound) };

        case 'atom':
            return { type: 'predicate', name: node.predicate, args: node.args.map(arg => toTerm(arg, bound)) };
    }
}

function boxToFol(drs: Drs, bound: ReadonlySet<string>, consequent?: DrsExpression): FolNode {
    const scope = new Set([...bound, ...drs.referents]);
    let body = conjoin(drs.conditions.map(condition => toFol(condition, scope)));
    if (consequent) {
        body = { type: 'implies', left: body, right: toFol(consequent, scope) };
    }

    const quantifier = consequent ? 'forall' : 'exists';
    for (const ref of [...drs.referents].reverse()) {
        body = { type: quantifier, variable: ref, body };
    }
    return body;
}

function conjoin(formulas: FolNode[]): FolNode {
    if (formulas.length === 0) return TRUE;
    return formulas.reduce((left, right) => ({ type: 'and', left, right }));
}

function toTerm(name: string, bound: ReadonlySet<string>): FolTerm {
    return bound.has(name) ? { type: 'variable', name } : { type: 'constant', name };
}
