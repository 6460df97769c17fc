import type { ConnectiveNode, LogicalNode, QuantifierNode } from '../../types/ast.js';
import {
    coalesce,
    copyNode,
    createConnective,
    createQuantifier,
    isConnective,
    isQuantifier,
    rescope,
    simplify,
} from '../../ast/nodes.js';

/**
 * Pull every quantifier to the front of the formula.
 *
 * Works bottom-up, so each subtree is already prenex when its parent is
 * handled. A connective's terms are reordered as: terms that carry a
 * quantifier prefix, then literals, then quantifier-free connectives. Each
 * quantified term is then rescoped above the connective, leftmost first, so
 * the relative order of quantifiers is kept. Same-kind quantifiers that end
 * up adjacent are coalesced.
 *
 * Requires standardized variables; see `rescope`.
 */
export function createPrenex(node: LogicalNode): LogicalNode {
    return simplify(prenex(node));
}

function prenex(node: LogicalNode): LogicalNode {
    switch (node.type) {
        case 'predicate':
        case 'not':
            return copyNode(node);

        case 'forall':
        case 'exists':
            return coalesce(createQuantifier(node.type, node.variables, prenex(node.body)));

        case 'and':
        case 'or': {
            const terms = node.terms.map(prenex);
            const quantified = terms.filter(isQuantifier);
            const literals = terms.filter(t => !isQuantifier(t) && !isConnective(t));
            const connectives = terms.filter(t => isConnective(t));

            const ordered = createConnective(node.type, [...quantified, ...literals, ...connectives]);
            return pullQuantifiers(ordered);
        }
    }
}

/**
 * Rescope the quantified terms of a connective, leftmost first, until none
 * is left. A rescoped quantifier's body takes its place, so a body that opens
 * with further quantifiers is pulled out next.
 */
function pullQuantifiers(connective: ConnectiveNode): LogicalNode {
    const prefix: Array<Pick<QuantifierNode, 'type' | 'variables'>> = [];
    let current = connective;

    let quantifier = current.terms.find(isQuantifier);
    while (quantifier !== undefined) {
        const rescoped = rescope(quantifier, current);
        // rescope always leaves a connective of the same kind as its body
        if (!isConnective(rescoped.body)) {
            throw new TypeError(`Rescoping '${rescoped.type}' lost its connective`);
        }
        prefix.push({ type: rescoped.type, variables: rescoped.variables });
        current = rescoped.body;
        quantifier = current.terms.find(isQuantifier);
    }

    let result: LogicalNode = current;
    for (let i = prefix.length - 1; i >= 0; i--) {
        result = coalesce(createQuantifier(prefix[i].type, prefix[i].variables, result));
    }
    return result;
}
