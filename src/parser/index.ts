import type { DrsExpression, ParseOptions } from '../types/index.js';
import { parseOptionsSchema, validateOptions } from '../types/options.js';
import { Tokenizer } from './tokenizer.js';
import { BoxerParser } from './parser.js';

export { Tokenizer, tokenize } from './tokenizer.js';
export { BoxerParser } from './parser.js';
export type { BoxerParserOptions } from './parser.js';

/**
 * Parse a single Boxer DRS term into a DRS expression
 */
export function parseDiscourse(input: string, options: ParseOptions = {}): DrsExpression {
    const resolved = validateOptions(parseOptionsSchema, options);
    const tokens = new Tokenizer(input).tokenize();
    const parser = new BoxerParser(tokens, input, resolved);
    return parser.parse();
}
