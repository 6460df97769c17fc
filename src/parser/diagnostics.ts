import type { Token } from '../types/parser.js';

/**
 * Rebuild the text of the axiom that contains a grammar error.
 *
 * Takes every token from the start of the innermost axiom still open on the
 * parser's stack up to the offending token, then keeps reading forward until
 * the parentheses opened so far are balanced again (or input runs out).
 *
 * @param axiomStart - index of the '(' that opened the innermost open axiom,
 *                     or the offending index when no axiom is open
 * @param errorIndex - index of the offending token
 */
export function reconstructBrokenAxiom(
    tokens: readonly Token[],
    axiomStart: number,
    errorIndex: number
): string {
    const captured: Token[] = [];
    let depth = 0;

    const take = (token: Token) => {
        captured.push(token);
        if (token.type === 'LPAREN') depth++;
        else if (token.type === 'RPAREN') depth--;
    };

    for (let i = Math.min(axiomStart, errorIndex); i <= errorIndex && i < tokens.length; i++) {
        if (tokens[i].type !== 'EOF') take(tokens[i]);
    }

    for (let i = errorIndex + 1; depth > 0 && i < tokens.length; i++) {
        if (tokens[i].type === 'EOF') break;
        take(tokens[i]);
    }

    return captured.map(t => t.value).join(' ');
}
