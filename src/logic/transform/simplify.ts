import type { Drs, DrsExpression } from '../../types/index.js';
import { DEFAULTS } from '../../types/options.js';
import { createConcat, createDrs, createEquals, createNot } from '../../drs/factory.js';
import { collectReferents, collectVariables, renameInDrs } from '../../drs/visitor.js';

/**
 * Flatten merges: a concatenation of two boxes becomes a single box.
 */
export function simplify(node: DrsExpression): DrsExpression {
    switch (node.type) {
        case 'drs':
            return createDrs(node.referents, node.conditions.map(simplify));

        case 'not':
            return createNot(simplify(node.operand));

        case 'or':
        case 'implies':
            return {
                type: node.type,
                left: simplify(node.left),
                right: simplify(node.right),
            };

        case 'concat': {
            const left = simplify(node.left);
            const right = simplify(node.right);
            if (left.type === 'drs' && right.type === 'drs') {
                return mergeDrs(left, right);
            }
            return createConcat(left, right);
        }

        case 'equals':
        case 'atom':
            return node;
    }
}

/**
 * Union of referents and conditions. Referents of `second` that are also
 * declared in `first` are alpha-converted to fresh names first.
 */
export function mergeDrs(first: Drs, second: Drs): Drs {
    const declared = new Set(collectReferents(first));
    const taken = new Set([...collectVariables(first), ...collectVariables(second)]);
    const renaming = new Map<string, string>();

    for (const ref of collectReferents(second)) {
        if (declared.has(ref)) {
            const fresh = freshVariable(taken);
            taken.add(fresh);
            renaming.set(ref, fresh);
        }
    }

    const renamed = renaming.size > 0 ? renameInDrs(second, renaming) : second;
    return createDrs(
        [...first.referents, ...renamed.referents],
        [...first.conditions, ...renamed.conditions]
    );
}

function freshVariable(taken: ReadonlySet<string>): string {
    let n = 1;
    while (taken.has(`${DEFAULTS.variablePrefix}${n}`)) n++;
    return `${DEFAULTS.variablePrefix}${n}`;
}

/**
 * Replace compound-noun relations `r_nn_2(a, b)` by `a = b`.
 */
export function foldCompoundNouns(node: DrsExpression): DrsExpression {
    switch (node.type) {
        case 'drs':
            return createDrs(node.referents, node.conditions.map(foldCompoundNouns));

        case 'not':
            return createNot(foldCompoundNouns(node.operand));

        case 'or':
        case 'implies':
        case 'concat':
            return {
                type: node.type,
                left: foldCompoundNouns(node.left),
                right: foldCompoundNouns(node.right),
            };

        case 'atom':
            if (node.predicate === DEFAULTS.compoundNounRelation && node.args.length === 2) {
                return createEquals(node.args[0], node.args[1]);
            }
            return node;

        case 'equals':
            return node;
    }
}

/**
 * Post-parse cleanup applied once to every parsed discourse.
 */
export function simplifyDiscourse(node: DrsExpression): DrsExpression {
    return foldCompoundNouns(simplify(node));
}
