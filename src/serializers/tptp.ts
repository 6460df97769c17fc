import type { ASTNode, LogicalNode, Term } from '../types/ast.js';
import { DEFAULTS } from '../types/options.js';
import { unsupportedNode } from './unsupported.js';

function tptpTerm(term: Term): string {
    return typeof term === 'string' ? term.toUpperCase() : tptpLogical(term);
}

/**
 * TPTP form of a node: variables upper case, predicate and function names
 * lower case.
 */
export function tptpLogical(node: ASTNode): string {
    switch (node.type) {
        case 'predicate':
            if (node.name === '=' && node.args.length === 2) {
                return `${tptpTerm(node.args[0])}=${tptpTerm(node.args[1])}`;
            }
            return `${node.name.toLowerCase()}(${node.args.map(tptpTerm).join(',')})`;
        case 'function':
            return `${node.name.toLowerCase()}(${node.args.map(tptpTerm).join(',')})`;
        case 'not': {
            const operand = node.operand;
            if (operand.type === 'not') {
                return tptpLogical(operand.operand);
            }
            if (operand.type === 'predicate') {
                // Parenthesized so it cannot run into special-symbol predicates
                return `~(${tptpLogical(operand)})`;
            }
            return `~${tptpLogical(operand)}`;
        }
        case 'and':
            return `(${node.terms.map(tptpLogical).join(' & ')})`;
        case 'or':
            return `(${node.terms.map(tptpLogical).join(' | ')})`;
        case 'forall':
            return `(! [${node.variables.map(v => v.toUpperCase()).join(',')}] : (${tptpLogical(node.body)}))`;
        case 'exists':
            return `(? [${node.variables.map(v => v.toUpperCase()).join(',')}] : (${tptpLogical(node.body)}))`;
        default:
            return unsupportedNode(node, 'TPTP');
    }
}

/**
 * fof(axiom<id*10>, axiom, <formula>).
 */
export function toTptp(sentence: LogicalNode, id: number): string {
    return `fof(axiom${id * DEFAULTS.tptpIdFactor}, axiom, ${tptpLogical(sentence)}).`;
}
