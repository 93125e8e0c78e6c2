/**
 * boxer-drs - Library Entry Point
 *
 * Decodes Boxer's Prolog DRS output into DRS expression trees.
 */

// Parser
export { parseDiscourse, Tokenizer, tokenize, BoxerParser } from './parser/index.js';
export type { BoxerParserOptions } from './parser/index.js';

// Predicate naming
export {
    buildPredicate,
    relationName,
    sanitizeName,
    decodeIndex,
    encodeIndex,
    makeVariable,
    parsePredicateArity,
} from './utils/predicateNaming.js';
export type { PredicateParts } from './utils/predicateNaming.js';

// Batches
export { demultiplexAndParse } from './batch/demultiplexer.js';
export { locateTermBlocks } from './batch/layout.js';
export type { TermBlock } from './batch/layout.js';
export { resolveDiscourseIds, formatBatchInput } from './batch/submission.js';
export type { DiscourseBatch } from './batch/submission.js';

// DRS construction and transforms
export * from './drs/factory.js';
export { traverse, collectReferents, collectVariables, renameVariables } from './drs/visitor.js';
export { drsToString } from './drs/printer.js';
export { simplify, mergeDrs, foldCompoundNouns, simplifyDiscourse } from './logic/transform/simplify.js';
export { toFol } from './logic/transform/fol.js';
export { folToString } from './utils/fol/printer.js';

// Types and Interfaces
export * from './types/index.js';
