import type { FolNode } from '../../types/index.js';

/**
 * Pretty-print a first-order formula in Prover9 syntax
 */
export function folToString(node: FolNode): string {
    switch (node.type) {
        case 'forall':
            return `all ${node.variable} (${folToString(node.body)})`;
        case 'exists':
            return `exists ${node.variable} (${folToString(node.body)})`;
        case 'implies':
            return `(${folToString(node.left)} -> ${folToString(node.right)})`;
        case 'and':
            return `(${folToString(node.left)} & ${folToString(node.right)})`;
        case 'or':
            return `(${folToString(node.left)} | ${folToString(node.right)})`;
        case 'not':
            return `-${folToString(node.operand)}`;
        case 'equals':
            return `${folToString(node.left)} = ${folToString(node.right)}`;
        case 'true':
            return '$T';
        case 'predicate':
            return `${node.name}(${node.args.map(folToString).join(', ')})`;
        case 'variable':
        case 'constant':
            return node.name;
    }
}
