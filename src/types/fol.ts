/**
 * First-order formulas produced from DRS expressions
 */

export type FolTerm =
    | { type: 'variable'; name: string }
    | { type: 'constant'; name: string };

export type FolNode =
    | FolTerm
    | { type: 'true' }
    | { type: 'forall' | 'exists'; variable: string; body: FolNode }
    | { type: 'implies' | 'and' | 'or'; left: FolNode; right: FolNode }
    | { type: 'not'; operand: FolNode }
    | { type: 'equals'; left: FolTerm; right: FolTerm }
    | { type: 'predicate'; name: string; args: FolTerm[] };

export type FolNodeType = FolNode['type'];
