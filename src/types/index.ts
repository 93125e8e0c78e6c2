/**
 * Shared type definitions
 */

// Re-export error types
export {
    LogicException,
    isLogicException,
    getSuggestion,
    createTokenizationError,
    createUnexpectedTokenError,
    createUnexpectedConditionError,
    createMalformedBatchLayoutError,
    createInvalidArityError,
    createInvalidOptionsError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export DRS types
export type {
    DrsNodeType,
    Drs,
    Negation,
    BinaryDrsExpression,
    Equality,
    Atom,
    DrsExpression,
    DiscourseResultMap,
} from './drs.js';

// Re-export FOL types
export type {
    FolTerm,
    FolNode,
    FolNodeType,
} from './fol.js';

// Re-export parser types
export type {
    TokenType,
    Token,
    OccurrenceIndex,
} from './parser.js';

// Re-export options
export {
    DEFAULTS,
    parseOptionsSchema,
    batchOptionsSchema,
    discourseIdsSchema,
    validateOptions,
} from './options.js';

export type {
    ParseOptions,
    ResolvedParseOptions,
    BatchOptions,
    ResolvedBatchOptions,
} from './options.js';
