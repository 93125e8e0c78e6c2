import type { DrsExpression } from '../types/index.js';

/**
 * Pretty-print a DRS in linear box notation, e.g. ([x0],[n_dog_1(x0)])
 */
export function drsToString(node: DrsExpression): string {
    switch (node.type) {
        case 'drs':
            return `([${node.referents.join(',')}],[${node.conditions.map(drsToString).join(', ')}])`;
        case 'not':
            return `-${drsToString(node.operand)}`;
        case 'or':
            return `(${drsToString(node.left)} | ${drsToString(node.right)})`;
        case 'implies':
            return `(${drsToString(node.left)} -> ${drsToString(node.right)})`;
        case 'concat':
            return `(${drsToString(node.left)} + ${drsToString(node.right)})`;
        case 'equals':
            return `(${node.left} = ${node.right})`;
        case 'atom':
            return `${node.predicate}(${node.args.join(',')})`;
    }
}
