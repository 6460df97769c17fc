import type { ASTNode, Term } from '../types/ast.js';

function termToString(term: Term): string {
    return typeof term === 'string' ? term : astToString(term);
}

/**
 * Debug rendering of an AST using logical symbols:
 * ∀(x,y)[...], ∃(x)[...], ~A, (A & B), (A | B), x = y
 */
export function astToString(node: ASTNode): string {
    switch (node.type) {
        case 'predicate':
            if (node.name === '=' && node.args.length === 2) {
                return `${termToString(node.args[0])} = ${termToString(node.args[1])}`;
            }
            return `${node.name}(${node.args.map(termToString).join(',')})`;
        case 'function':
            return `${node.name}(${node.args.map(termToString).join(',')})`;
        case 'not':
            return `~${astToString(node.operand)}`;
        case 'and':
            return `(${node.terms.map(astToString).join(' & ')})`;
        case 'or':
            return `(${node.terms.map(astToString).join(' | ')})`;
        case 'forall':
            return `∀(${node.variables.join(',')})[${astToString(node.body)}]`;
        case 'exists':
            return `∃(${node.variables.join(',')})[${astToString(node.body)}]`;
    }
}
