import type { Token, TokenType } from '../types/parser.js';
import { createTokenizationError } from '../types/errors.js';

const PUNCTUATION: Record<string, TokenType> = {
    '(': 'LPAREN',
    ')': 'RPAREN',
    '[': 'LBRACKET',
    ']': 'RBRACKET',
    ',': 'COMMA',
    ':': 'COLON',
};

const QUOTE = "'";
const ESCAPE = '\\';

/**
 * Tokenizer for Boxer's Prolog term output
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    // Atom being accumulated; quoted segments and bare characters may alternate
    private atom: string = '';
    private atomStart: number = -1;
    private atomQuoted: boolean = false;

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            const char = this.input[this.pos];

            if (char === QUOTE) {
                this.readQuoted();
                continue;
            }

            if (/\s/.test(char)) {
                this.flushAtom();
                this.pos++;
                continue;
            }

            const punctuation = PUNCTUATION[char];
            if (punctuation) {
                this.flushAtom();
                this.tokens.push({ type: punctuation, value: char, position: this.pos });
                this.pos++;
                continue;
            }

            if (char < ' ' || char === '\u007f') {
                throw createTokenizationError(
                    `Illegal control character (code ${char.charCodeAt(0)})`,
                    this.input,
                    this.pos
                );
            }

            this.startAtom();
            this.atom += char;
            this.pos++;
        }

        this.flushAtom();
        this.tokens.push({ type: 'EOF', value: '', position: this.input.length });
        return this.tokens;
    }

    private readQuoted(): void {
        const open = this.pos;
        this.startAtom();
        this.atomQuoted = true;
        this.pos++;

        let content = '';
        while (this.pos < this.input.length && this.input[this.pos] !== QUOTE) {
            if (this.input[this.pos] === ESCAPE) {
                this.pos++;
                if (this.pos >= this.input.length) {
                    throw createTokenizationError(
                        `Escape character '${ESCAPE}' at end of input`,
                        this.input,
                        this.pos - 1
                    );
                }
            }
            content += this.input[this.pos];
            this.pos++;
        }

        if (this.pos >= this.input.length) {
            throw createTokenizationError('Unterminated quoted atom', this.input, open);
        }
        if (content === '') {
            throw createTokenizationError('Empty quoted atom', this.input, open);
        }

        this.atom += content;
        this.pos++; // closing quote
    }

    private startAtom(): void {
        if (this.atomStart < 0) {
            this.atomStart = this.pos;
        }
    }

    private flushAtom(): void {
        if (this.atomStart < 0) return;
        this.tokens.push({
            type: this.atomQuoted ? 'QUOTED' : 'WORD',
            value: this.atom,
            position: this.atomStart,
        });
        this.atom = '';
        this.atomStart = -1;
        this.atomQuoted = false;
    }
}

export function tokenize(input: string): Token[] {
    return new Tokenizer(input).tokenize();
}
