import type { ParsedDocument } from '../types/parser.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';
export { reconstructBrokenAxiom } from './diagnostics.js';

/**
 * Parse CLIF text into its axioms and imports.
 *
 * Returns null for empty input. Throws a GRAMMAR_ERROR LogicException on a
 * malformed construct; unknown characters are skipped and reported in
 * `diagnostics`.
 */
export function parse(input: string): ParsedDocument | null {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens);
    const document = parser.parse();
    if (document === null) {
        return null;
    }
    return { ...document, diagnostics: tokenizer.diagnostics };
}
