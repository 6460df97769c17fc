import type { LogicalNode, Term } from '../types/ast.js';
import type { ParsedDocument, Token, TokenType } from '../types/parser.js';
import { createGrammarError } from '../types/errors.js';
import {
    createAnd,
    createBiconditional,
    createExists,
    createForAll,
    createFunction,
    createImplication,
    createNot,
    createOr,
    createPredicate,
} from '../ast/factory.js';
import { reconstructBrokenAxiom } from './diagnostics.js';

type Statement =
    | { kind: 'axiom'; axiom: LogicalNode }
    | { kind: 'import'; uri: string }
    | { kind: 'comment' };

/**
 * Recursive-descent parser for CLIF documents
 *
 * Grammar:
 *   document   = [COMMENT] ( '(' 'cl-text' URI statement ')' | statement )
 *   statement  = ( axiom | import | comment )+
 *   import     = '(' 'cl-imports' URI ')'
 *   comment    = '(' 'cl-comment' STRING ')'
 *   axiom      = '(' 'not' axiom ')'
 *              | '(' ('and' | 'or') axiom+ ')'
 *              | '(' ('if' | 'iff') axiom axiom ')'
 *              | '(' ('forall' | 'exists') '(' NONLOGICAL+ ')' axiom ')'
 *              | '(' NONLOGICAL parameter+ ')'
 *   parameter  = NONLOGICAL | '(' NONLOGICAL parameter+ ')'
 *
 * Conditionals and biconditionals are desugared here into disjunctions and
 * conjunctions; no later stage sees them.
 */
export class Parser {
    private tokens: Token[];
    private pos: number = 0;
    /** Token indices of the '(' of every axiom currently being parsed */
    private openAxioms: number[] = [];

    constructor(tokens: Token[]) {
        this.tokens = tokens;
    }

    /**
     * Parse the whole token stream. Returns null when there is nothing to parse.
     */
    parse(): Omit<ParsedDocument, 'diagnostics'> | null {
        if (this.current().type === 'EOF') {
            return null;
        }

        if (this.current().type === 'COMMENT') {
            this.advance();
        }

        let uri: string | undefined;
        let statements: Statement[];

        if (this.current().type === 'LPAREN' && this.peek(1).type === 'START') {
            this.advance();
            this.advance();
            uri = this.expect('URI', 'bad URI in cl-text').value;
            statements = this.parseStatements();
            this.expect('RPAREN', 'unclosed cl-text');
        } else {
            statements = this.parseStatements();
        }

        if (this.current().type !== 'EOF') {
            this.fail('expected end of input');
        }

        const axioms: LogicalNode[] = [];
        const imports: string[] = [];
        for (const statement of statements) {
            if (statement.kind === 'axiom') axioms.push(statement.axiom);
            else if (statement.kind === 'import') imports.push(statement.uri);
        }

        return { uri, axioms, imports };
    }

    private current(): Token {
        return this.peek(0);
    }

    private peek(offset: number): Token {
        const index = Math.min(this.pos + offset, this.tokens.length - 1);
        return this.tokens[index] ?? { type: 'EOF', value: '', position: 0, line: 1 };
    }

    private advance(): Token {
        const token = this.current();
        if (this.pos < this.tokens.length - 1) {
            this.pos++;
        }
        return token;
    }

    private expect(type: TokenType, message: string): Token {
        if (this.current().type !== type) {
            this.fail(message);
        }
        return this.advance();
    }

    private fail(message: string): never {
        const axiomStart = this.openAxioms.length > 0
            ? this.openAxioms[this.openAxioms.length - 1]
            : this.pos;
        const context = reconstructBrokenAxiom(this.tokens, axiomStart, this.pos);
        throw createGrammarError(message, this.current(), context);
    }

    private parseStatements(): Statement[] {
        const statements: Statement[] = [];

        while (this.current().type === 'LPAREN') {
            statements.push(this.parseStatement());
        }

        if (statements.length === 0) {
            this.fail(this.current().type === 'EOF' ? 'unexpectedly reached end of input' : 'expected an axiom');
        }

        return statements;
    }

    private parseStatement(): Statement {
        const next = this.peek(1).type;

        if (next === 'IMPORT') {
            this.advance();
            this.advance();
            const uri = this.expect('URI', 'bad URI in import').value;
            this.expect('RPAREN', 'unclosed import');
            return { kind: 'import', uri };
        }

        if (next === 'CLCOMMENT') {
            this.advance();
            this.advance();
            this.expect('STRING', "comment text must be a quoted 'string'");
            this.expect('RPAREN', 'unclosed comment');
            return { kind: 'comment' };
        }

        return { kind: 'axiom', axiom: this.parseAxiom() };
    }

    private parseAxiom(): LogicalNode {
        const start = this.pos;
        this.expect('LPAREN', 'expected an axiom');
        this.openAxioms.push(start);

        const head = this.current();
        let axiom: LogicalNode;

        switch (head.type) {
            case 'NOT':
                this.advance();
                axiom = createNot(this.parseAxiom());
                break;

            case 'AND':
                this.advance();
                axiom = createAnd(this.parseAxiomList());
                break;

            case 'OR':
                this.advance();
                axiom = createOr(this.parseAxiomList());
                break;

            case 'IF': {
                this.advance();
                const antecedent = this.parseAxiom();
                const consequent = this.parseAxiom();
                axiom = createImplication(antecedent, consequent);
                break;
            }

            case 'IFF': {
                this.advance();
                const left = this.parseAxiom();
                const right = this.parseAxiom();
                axiom = createBiconditional(left, right);
                break;
            }

            case 'FORALL':
            case 'EXISTS': {
                this.advance();
                this.expect('LPAREN', 'quantified variables must be parenthesized');
                const variables = this.parseNames();
                this.expect('RPAREN', 'bad variable list');
                const body = this.parseAxiom();
                axiom = head.type === 'FORALL'
                    ? createForAll(variables, body)
                    : createExists(variables, body);
                break;
            }

            case 'NONLOGICAL': {
                this.advance();
                axiom = createPredicate(head.value, this.parseParameters());
                break;
            }

            default:
                this.fail('expected a connective, quantifier or predicate name');
        }

        this.expect('RPAREN', 'expected closing parenthesis');
        this.openAxioms.pop();
        return axiom;
    }

    private parseAxiomList(): LogicalNode[] {
        const axioms: LogicalNode[] = [this.parseAxiom()];
        while (this.current().type === 'LPAREN') {
            axioms.push(this.parseAxiom());
        }
        return axioms;
    }

    private parseNames(): string[] {
        const names: string[] = [];
        while (this.current().type === 'NONLOGICAL') {
            names.push(this.advance().value);
        }
        if (names.length === 0) {
            this.fail('expected at least one variable');
        }
        return names;
    }

    private parseParameters(): Term[] {
        const parameters: Term[] = [];

        while (true) {
            const token = this.current();
            if (token.type === 'NONLOGICAL') {
                parameters.push(this.advance().value);
            } else if (token.type === 'LPAREN') {
                this.advance();
                const name = this.expect('NONLOGICAL', 'expected a function name');
                parameters.push(createFunction(name.value, this.parseParameters()));
                this.expect('RPAREN', 'unclosed function');
            } else {
                break;
            }
        }

        if (parameters.length === 0) {
            this.fail('expected at least one parameter');
        }
        return parameters;
    }
}
