import type { Token, TokenType } from '../types/parser.js';
import type { LogicError } from '../types/errors.js';
import { createLexError } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('tokenizer');

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ['not', 'NOT'],
    ['and', 'AND'],
    ['or', 'OR'],
    ['exists', 'EXISTS'],
    ['forall', 'FORALL'],
    ['iff', 'IFF'],
    ['if', 'IF'],
    ['cl-comment', 'CLCOMMENT'],
    ['cl-text', 'START'],
    ['cl-imports', 'IMPORT'],
]);

// Sticky patterns, matched at the current position only
const URI = /https?:\/\/(?:[a-zA-Z0-9$=?/%\-_@.&+!*,:#~]|%[0-9a-fA-F]{2})+/y;
const COMMENT = /\/\*[\s\S]+?\*\//y;
const STRING = /'([\s\S]+?)'/y;
const NONLOGICAL = /[\p{L}\p{N}_<>=-]+/uy;
const CHARACTER = /./suy;

/**
 * Tokenizer for CLIF documents
 *
 * Unknown characters are recorded as LEX_ERROR diagnostics and skipped one
 * at a time.
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private line: number = 1;
    private tokens: Token[] = [];
    private errors: LogicError[] = [];

    constructor(input: string) {
        this.input = input;
    }

    get diagnostics(): LogicError[] {
        return [...this.errors];
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            switch (char) {
                case '(': this.addToken('LPAREN', '('); continue;
                case ')': this.addToken('RPAREN', ')'); continue;
            }

            const uri = this.matchPattern(URI);
            if (uri !== null) {
                this.addToken('URI', uri);
                continue;
            }

            const comment = this.matchPattern(COMMENT);
            if (comment !== null) {
                this.addToken('COMMENT', comment);
                continue;
            }

            const quoted = this.matchPattern(STRING);
            if (quoted !== null) {
                this.addToken('STRING', quoted);
                continue;
            }

            const word = this.matchPattern(NONLOGICAL);
            if (word !== null) {
                // Maximal munch first, keywords second: 'forall' is never a name
                // and 'nothing' is never 'not' followed by 'hing'
                this.addToken(KEYWORDS.get(word) ?? 'NONLOGICAL', word);
                continue;
            }

            // One code point, so a surrogate pair is a single unknown character
            const unknown = this.matchPattern(CHARACTER) ?? char;
            const error = createLexError(unknown, this.pos, this.line);
            this.errors.push(error);
            logger.warn(error.message);
            this.pos += unknown.length;
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos, line: this.line });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            if (this.input[this.pos] === '\n') {
                this.line++;
            }
            this.pos++;
        }
    }

    private matchPattern(pattern: RegExp): string | null {
        pattern.lastIndex = this.pos;
        const match = pattern.exec(this.input);
        return match ? match[0] : null;
    }

    private addToken(type: TokenType, value: string): void {
        this.tokens.push({ type, value, position: this.pos, line: this.line });
        this.pos += value.length;
        // Comments and strings may span lines
        for (const c of value) {
            if (c === '\n') this.line++;
        }
    }
}
