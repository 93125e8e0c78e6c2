/**
 * Parser Types
 */

export type TokenType =
    | 'WORD'        // drs, x0, dog, +, 1001
    | 'QUOTED'      // 'XXXX', 'New York'
    | 'LPAREN'      // (
    | 'RPAREN'      // )
    | 'LBRACKET'    // [
    | 'RBRACKET'    // ]
    | 'COMMA'       // ,
    | 'COLON'       // :
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}

/**
 * A decoded (sentence, word) occurrence position, both 0-based.
 */
export interface OccurrenceIndex {
    sentence: number;
    word: number;
}
