import type { LogicalNode } from '../../types/ast.js';
import { createAnd, createNot, createOr } from '../../ast/factory.js';
import { copyNode, createQuantifier } from '../../ast/nodes.js';

/**
 * Push negations down to the predicates (negation normal form):
 *
 *   ~(A & B)  →  ~A | ~B
 *   ~(A | B)  →  ~A & ~B
 *   ~∀x[A]    →  ∃x[~A]
 *   ~∃x[A]    →  ∀x[~A]
 *   ~~A       →  A
 */
export function pushNegation(node: LogicalNode): LogicalNode {
    switch (node.type) {
        case 'predicate':
            return copyNode(node);

        case 'not':
            return negate(node.operand);

        case 'and':
            return createAnd(node.terms.map(pushNegation));

        case 'or':
            return createOr(node.terms.map(pushNegation));

        case 'forall':
        case 'exists':
            return createQuantifier(node.type, node.variables, pushNegation(node.body));
    }
}

/**
 * Normal form of ~node.
 */
function negate(node: LogicalNode): LogicalNode {
    switch (node.type) {
        case 'predicate':
            return createNot(copyNode(node));

        case 'not':
            return pushNegation(node.operand);

        case 'and':
            return createOr(node.terms.map(negate));

        case 'or':
            return createAnd(node.terms.map(negate));

        case 'forall':
            return createQuantifier('exists', node.variables, negate(node.body));

        case 'exists':
            return createQuantifier('forall', node.variables, negate(node.body));
    }
}
