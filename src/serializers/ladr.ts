import type { ASTNode, LogicalNode, Term } from '../types/ast.js';
import { unsupportedNode } from './unsupported.js';

function ladrTerm(term: Term): string {
    return typeof term === 'string' ? term : ladrLogical(term);
}

/**
 * LADR (Prover9/Mace4) form of a node. Names are kept as written.
 */
export function ladrLogical(node: ASTNode): string {
    switch (node.type) {
        case 'predicate':
            if (node.name === '=' && node.args.length === 2) {
                return `${ladrTerm(node.args[0])} = ${ladrTerm(node.args[1])}`;
            }
            return `${node.name}(${node.args.map(ladrTerm).join(',')})`;
        case 'function':
            return `${node.name}(${node.args.map(ladrTerm).join(',')})`;
        case 'not': {
            const operand = node.operand;
            if (operand.type === 'not') {
                return ladrLogical(operand.operand);
            }
            if (operand.type === 'predicate') {
                return `-(${ladrLogical(operand)})`;
            }
            return `-${ladrLogical(operand)}`;
        }
        case 'and':
            return `(${node.terms.map(ladrLogical).join(' & ')})`;
        case 'or':
            return `(${node.terms.map(ladrLogical).join(' | ')})`;
        case 'forall':
            return `(${node.variables.map(v => `all ${v} `).join('')}(${ladrLogical(node.body)}))`;
        case 'exists':
            return `(${node.variables.map(v => `exists ${v} `).join('')}(${ladrLogical(node.body)}))`;
        default:
            return unsupportedNode(node, 'LADR');
    }
}

export function toLadr(sentence: LogicalNode): string {
    return `${ladrLogical(sentence)}.`;
}
