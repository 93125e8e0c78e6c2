import type { DrsExpression, OccurrenceIndex } from '../types/index.js';
import type { Token, TokenType } from '../types/parser.js';
import type { LogicException } from '../types/errors.js';
import {
    createUnexpectedConditionError,
    createUnexpectedTokenError,
} from '../types/errors.js';
import {
    createAtom,
    createConcat,
    createDrs,
    createEquals,
    createImplies,
    createNot,
    createOr,
} from '../drs/factory.js';
import {
    buildPredicate,
    decodeIndex,
    makeVariable,
    relationName,
} from '../utils/predicateNaming.js';

export interface BoxerParserOptions {
    occurIndex?: boolean;
    discourseId?: string;
}

const TOKEN_LABELS: Record<TokenType, string> = {
    WORD: 'atom',
    QUOTED: 'atom',
    LPAREN: "'('",
    RPAREN: "')'",
    LBRACKET: "'['",
    RBRACKET: "']'",
    COMMA: "','",
    COLON: "':'",
    EOF: 'end of input',
};

/**
 * Parser for Boxer DRS terms
 *
 * Grammar (EBNF-ish):
 *   term       = index-list? head
 *   index-list = '[' (INT (',' INT)*)? ']' ':'
 *   head       = 'drs' '(' '[' (index-list ATOM),* ']' ',' '[' (index-list head),* ']' ')'
 *              | ('merge' | 'smerge' | 'or' | 'imp') '(' term ',' term ')'
 *              | 'not' '(' term ')'
 *              | 'eq' '(' ATOM ',' ATOM ')'
 *              | 'prop' '(' ATOM ',' term ')'
 *              | ('pred' | 'named') '(' ATOM ',' ATOM ',' ATOM ',' ATOM ')'
 *              | 'rel' '(' ATOM ',' ATOM ',' ATOM ',' ATOM ')'
 *              | 'card' '(' ATOM ',' ATOM ',' ATOM ')'
 *              | 'timex' '(' ATOM ',' ('date' | 'time') '(' slot (',' slot)* ')' ')'
 *              | 'whq' '(' '[' (ATOM ':' ATOM),* ']' ',' term ',' ATOM ',' term ')'
 *   slot       = index-list ATOM
 */
export class BoxerParser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;
    private occurIndex: boolean;
    private discourseId?: string;

    constructor(tokens: Token[], originalInput: string, options: BoxerParserOptions = {}) {
        this.tokens = tokens;
        this.originalInput = originalInput;
        this.occurIndex = options.occurIndex ?? false;
        this.discourseId = options.discourseId;
    }

    /**
     * Parse one term that must span the whole input (an optional final '.' is allowed).
     */
    parse(): DrsExpression {
        const result = this.parseTerm();
        if (this.current().type === 'WORD' && this.current().value === '.') {
            this.advance();
        }
        if (this.current().type !== 'EOF') {
            throw this.unexpected(TOKEN_LABELS.EOF);
        }
        return result;
    }

    /**
     * Parse exactly one term, leaving any following tokens unconsumed.
     */
    parseTerm(): DrsExpression {
        const indices = this.current().type === 'LBRACKET' ? this.parseIndexList() : [];
        const expressions = this.parseHead(indices);
        return expressions.length === 1 ? expressions[0] : createDrs([], expressions);
    }

    /** Index of the next unconsumed token. */
    get offset(): number {
        return this.pos;
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        if (token.type !== 'EOF') this.pos++;
        return token;
    }

    private expect(type: TokenType): Token {
        if (this.current().type !== type) {
            throw this.unexpected(TOKEN_LABELS[type]);
        }
        return this.advance();
    }

    private expectAtom(expected: string): string {
        const token = this.current();
        if (token.type !== 'WORD' && token.type !== 'QUOTED') {
            throw this.unexpected(expected);
        }
        this.advance();
        return token.value;
    }

    private accept(type: TokenType): boolean {
        if (this.current().type === type) {
            this.advance();
            return true;
        }
        return false;
    }

    private unexpected(expected: string, token: Token = this.current()): LogicException {
        return createUnexpectedTokenError(expected, token.value, this.originalInput, token.position);
    }

    private parseIndexList(): OccurrenceIndex[] {
        const indices: OccurrenceIndex[] = [];
        this.expect('LBRACKET');

        while (this.current().type !== 'RBRACKET') {
            const token = this.current();
            const value = this.expectAtom('position index');
            if (!/^\d+$/.test(value)) {
                throw this.unexpected('position index', token);
            }
            indices.push(decodeIndex(Number(value)));
            if (!this.accept('COMMA')) break;
        }

        this.expect('RBRACKET');
        this.expect('COLON');
        return indices;
    }

    private parseHead(indices: OccurrenceIndex[]): DrsExpression[] {
        const head = this.current();
        const keyword = this.expectAtom('condition');

        if (head.type === 'WORD') {
            switch (keyword) {
                case 'drs': return [this.parseDrs()];
                case 'merge':
                case 'smerge': return [this.parseBinary(createConcat)];
                case 'not': return [this.parseNot()];
                case 'or': return [this.parseBinary(createOr)];
                case 'imp': return [this.parseBinary(createImplies)];
                case 'eq': return [this.parseEq()];
                case 'prop': return [this.parseProp()];
                case 'pred': return [this.parsePred(indices)];
                case 'named': return [this.parseNamed()];
                case 'rel': return [this.parseRel()];
                case 'card': return [this.parseCard()];
                case 'timex': return this.parseTimex();
                case 'whq': return [this.parseWhq()];
            }
        }

        throw createUnexpectedConditionError(keyword, this.originalInput, head.position);
    }

    private parseVariable(expected: string = 'variable'): string {
        return makeVariable(this.expectAtom(expected));
    }

    private makeAtom(predicate: string, ...args: string[]): DrsExpression {
        return createAtom(predicate, ...args.map(makeVariable));
    }

    // drs([[1001]:x0], [[1002]:pred(x0, dog, n, 0)])
    private parseDrs(): DrsExpression {
        this.expect('LPAREN');
        this.expect('LBRACKET');
        const referents: string[] = [];
        while (this.current().type !== 'RBRACKET') {
            this.parseIndexList();
            referents.push(this.parseVariable('referent'));
            if (!this.accept('COMMA')) break;
        }
        this.expect('RBRACKET');
        this.expect('COMMA');

        this.expect('LBRACKET');
        const conditions: DrsExpression[] = [];
        while (this.current().type !== 'RBRACKET') {
            const indices = this.parseIndexList();
            conditions.push(...this.parseHead(indices));
            if (!this.accept('COMMA')) break;
        }
        this.expect('RBRACKET');
        this.expect('RPAREN');
        return createDrs(referents, conditions);
    }

    private parseBinary(constructor: (left: DrsExpression, right: DrsExpression) => DrsExpression): DrsExpression {
        this.expect('LPAREN');
        const left = this.parseTerm();
        this.expect('COMMA');
        const right = this.parseTerm();
        this.expect('RPAREN');
        return constructor(left, right);
    }

    private parseNot(): DrsExpression {
        this.expect('LPAREN');
        const operand = this.parseTerm();
        this.expect('RPAREN');
        return createNot(operand);
    }

    private parseEq(): DrsExpression {
        this.expect('LPAREN');
        const left = this.parseVariable();
        this.expect('COMMA');
        const right = this.parseVariable();
        this.expect('RPAREN');
        return createEquals(left, right);
    }

    // prop(x1, drs(...)): the proposition variable is not kept
    private parseProp(): DrsExpression {
        this.expect('LPAREN');
        this.parseVariable();
        this.expect('COMMA');
        const term = this.parseTerm();
        this.expect('RPAREN');
        return term;
    }

    // pred(x0, dog, n, 0)
    private parsePred(indices: OccurrenceIndex[]): DrsExpression {
        this.expect('LPAREN');
        const arg = this.expectAtom('variable');
        this.expect('COMMA');
        const lemma = this.expectAtom('lemma');
        this.expect('COMMA');
        const pos = this.expectAtom('part of speech');
        this.expect('COMMA');
        this.expectAtom('sense');
        this.expect('RPAREN');

        const predicate = buildPredicate({
            pos,
            lemma,
            indices,
            arity: 1,
            discourseId: this.discourseId,
            occurIndex: this.occurIndex,
        });
        return this.makeAtom(predicate, arg);
    }

    // named(x0, john, per, 0)
    private parseNamed(): DrsExpression {
        this.expect('LPAREN');
        const arg = this.expectAtom('variable');
        this.expect('COMMA');
        const name = this.expectAtom('name');
        this.expect('COMMA');
        this.expectAtom('named entity category');
        this.expect('COMMA');
        this.expectAtom('sense');
        this.expect('RPAREN');
        return this.makeAtom(relationName(name, 1, 'n'), arg);
    }

    // rel(x1, x0, agent, 0)
    private parseRel(): DrsExpression {
        this.expect('LPAREN');
        const first = this.expectAtom('variable');
        this.expect('COMMA');
        const second = this.expectAtom('variable');
        this.expect('COMMA');
        const name = this.expectAtom('relation name');
        this.expect('COMMA');
        this.expectAtom('sense');
        this.expect('RPAREN');
        return this.makeAtom(relationName(name, 2), first, second);
    }

    // card(x0, 28, ge)
    private parseCard(): DrsExpression {
        this.expect('LPAREN');
        const arg = this.expectAtom('variable');
        this.expect('COMMA');
        const value = this.expectAtom('cardinality');
        this.expect('COMMA');
        const comparator = this.expectAtom('comparator');
        this.expect('RPAREN');
        return this.makeAtom(relationName('card', 3), arg, value, comparator);
    }

    // timex(x0, date([]:+, []:'XXXX', [1004]:'04', []:'XX'))
    private parseTimex(): DrsExpression[] {
        this.expect('LPAREN');
        const arg = this.expectAtom('variable');
        this.expect('COMMA');

        const functorToken = this.current();
        const functor = this.expectAtom('date or time');
        if (functorToken.type !== 'WORD' || (functor !== 'date' && functor !== 'time')) {
            throw createUnexpectedConditionError(functor, this.originalInput, functorToken.position);
        }

        this.expect('LPAREN');
        const slots = functor === 'date' ? this.parseDate(arg) : this.parseTime(arg);
        this.expect('RPAREN');
        this.expect('RPAREN');

        return [this.makeAtom(relationName(functor, 1), arg), ...slots];
    }

    // Slot positions are not kept
    private parseSlot(): string {
        this.parseIndexList();
        return this.expectAtom('time expression value');
    }

    private parseDate(arg: string): DrsExpression[] {
        const conditions: DrsExpression[] = [];

        const polarity = this.parseSlot();
        if (polarity === '+') {
            conditions.push(this.makeAtom('r_pol_2', arg, 'pos'));
        } else if (polarity === '-') {
            conditions.push(this.makeAtom('r_pol_2', arg, 'neg'));
        }
        this.expect('COMMA');

        const year = this.parseSlot();
        if (year !== 'XXXX') {
            conditions.push(this.makeAtom('r_year_2', arg, year.replace(/:/g, '_')));
        }
        this.expect('COMMA');

        const month = this.parseSlot();
        if (month !== 'XX') {
            conditions.push(this.makeAtom('r_month_2', arg, month));
        }
        this.expect('COMMA');

        const day = this.parseSlot();
        if (day !== 'XX') {
            conditions.push(this.makeAtom('r_day_2', arg, day));
        }

        return conditions;
    }

    private parseTime(arg: string): DrsExpression[] {
        const conditions: DrsExpression[] = [];
        const predicates = ['r_hour_2', 'r_min_2', 'r_sec_2'];

        predicates.forEach((predicate, i) => {
            if (i > 0) this.expect('COMMA');
            const value = this.parseSlot();
            if (value !== 'XX') {
                conditions.push(this.makeAtom(predicate, arg, value));
            }
        });

        return conditions;
    }

    // whq([des:thing], drs(...), x0, drs(...))
    private parseWhq(): DrsExpression {
        this.expect('LPAREN');
        this.expect('LBRACKET');
        const answerTypes: string[] = [];
        while (this.current().type !== 'RBRACKET') {
            const category = this.expectAtom('answer category');
            this.expect('COLON');
            const answer = this.expectAtom('answer type');
            if (category === 'des') {
                answerTypes.push(answer);
            } else if (category === 'num') {
                answerTypes.push('number', answer === 'cou' ? 'count' : answer);
            } else {
                answerTypes.push(answer);
            }
            if (!this.accept('COMMA')) break;
        }
        this.expect('RBRACKET');
        this.expect('COMMA');

        const restriction = this.parseTerm();
        this.expect('COMMA');
        const ref = this.parseVariable('answer variable');
        this.expect('COMMA');
        const body = this.parseTerm();
        this.expect('RPAREN');

        const typeDrs = createDrs([], answerTypes.map(type => createAtom(relationName(type, 1, 'n'), ref)));
        return createConcat(typeDrs, createConcat(restriction, body));
    }
}
