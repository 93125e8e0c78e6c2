import type { Drs, DrsExpression } from '../types/index.js';

/**
 * Generic DRS visitor (pre-order)
 */
export function traverse(node: DrsExpression, visitor: (node: DrsExpression) => void): void {
    visitor(node);

    switch (node.type) {
        case 'drs':
            for (const condition of node.conditions) {
                traverse(condition, visitor);
            }
            break;
        case 'not':
            traverse(node.operand, visitor);
            break;
        case 'or':
        case 'implies':
        case 'concat':
            traverse(node.left, visitor);
            traverse(node.right, visitor);
            break;
        case 'equals':
        case 'atom':
            break;
    }
}

/**
 * All referents declared anywhere in the expression, in declaration order.
 */
export function collectReferents(node: DrsExpression): string[] {
    const referents: string[] = [];
    traverse(node, n => {
        if (n.type === 'drs') {
            for (const ref of n.referents) {
                if (!referents.includes(ref)) referents.push(ref);
            }
        }
    });
    return referents;
}

/**
 * Every variable name: referents, atom arguments and equality sides.
 */
export function collectVariables(node: DrsExpression): Set<string> {
    const variables = new Set<string>();
    traverse(node, n => {
        switch (n.type) {
            case 'drs':
                n.referents.forEach(ref => variables.add(ref));
                break;
            case 'equals':
                variables.add(n.left);
                variables.add(n.right);
                break;
            case 'atom':
                n.args.forEach(arg => variables.add(arg));
                break;
        }
    });
    return variables;
}

/**
 * Apply a variable renaming everywhere, declarations included.
 */
export function renameVariables(node: DrsExpression, renaming: ReadonlyMap<string, string>): DrsExpression {
    const swap = (name: string) => renaming.get(name) ?? name;

    switch (node.type) {
        case 'drs':
            return renameInDrs(node, renaming);
        case 'not':
            return { type: 'not', operand: renameVariables(node.operand, renaming) };
        case 'or':
        case 'implies':
        case 'concat':
            return {
                type: node.type,
                left: renameVariables(node.left, renaming),
                right: renameVariables(node.right, renaming),
            };
        case 'equals':
            return { type: 'equals', left: swap(node.left), right: swap(node.right) };
        case 'atom':
            return { type: 'atom', predicate: node.predicate, args: node.args.map(swap) };
    }
}

export function renameInDrs(drs: Drs, renaming: ReadonlyMap<string, string>): Drs {
    return {
        type: 'drs',
        referents: drs.referents.map(ref => renaming.get(ref) ?? ref),
        conditions: drs.conditions.map(c => renameVariables(c, renaming)),
    };
}
