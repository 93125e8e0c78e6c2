import type { Atom, BinaryDrsExpression, Drs, DrsExpression, Equality, Negation } from '../types/index.js';
import { createInvalidArityError } from '../types/errors.js';

export function createDrs(referents: readonly string[] = [], conditions: readonly DrsExpression[] = []): Drs {
    return { type: 'drs', referents: [...referents], conditions: [...conditions] };
}

export function createNot(operand: DrsExpression): Negation {
    return { type: 'not', operand };
}

export function createOr(left: DrsExpression, right: DrsExpression): BinaryDrsExpression {
    return { type: 'or', left, right };
}

export function createImplies(left: DrsExpression, right: DrsExpression): BinaryDrsExpression {
    return { type: 'implies', left, right };
}

export function createConcat(left: DrsExpression, right: DrsExpression): BinaryDrsExpression {
    return { type: 'concat', left, right };
}

export function createEquals(left: string, right: string): Equality {
    return { type: 'equals', left, right };
}

export function createAtom(predicate: string, ...args: string[]): Atom {
    if (args.length === 0) {
        throw createInvalidArityError(0, predicate);
    }
    return { type: 'atom', predicate, args };
}
