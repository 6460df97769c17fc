/**
 * Parser Types
 */

import type { LogicalNode } from './ast.js';
import type { LogicError } from './errors.js';

export type TokenType =
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'NOT'           // not
    | 'AND'           // and
    | 'OR'            // or
    | 'EXISTS'        // exists
    | 'FORALL'        // forall
    | 'IFF'           // iff
    | 'IF'            // if
    | 'URI'           // http://..., https://...
    | 'COMMENT'       // /* ... */
    | 'CLCOMMENT'     // cl-comment
    | 'STRING'        // 'quoted text'
    | 'START'         // cl-text
    | 'IMPORT'        // cl-imports
    | 'NONLOGICAL'    // predicate, function, variable and constant names
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    /** Offset into the source text */
    position: number;
    /** 1-based line number */
    line: number;
}

/**
 * Result of parsing one CLIF document.
 */
export interface ParsedDocument {
    /** URI given by a surrounding (cl-text ...) form */
    uri?: string;
    axioms: LogicalNode[];
    imports: string[];
    /** Lexical problems that were skipped over */
    diagnostics: LogicError[];
}
