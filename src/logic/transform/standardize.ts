import type { LogicalNode, Term } from '../../types/ast.js';
import {
    createAnd,
    createFunction,
    createNot,
    createOr,
    createPredicate,
} from '../../ast/factory.js';
import { createQuantifier } from '../../ast/nodes.js';
import { variableNames } from '../sequence.js';
import { freeNames } from '../analysis.js';

/**
 * Standardize variables - give each quantified variable a unique name.
 *
 * Quantifiers are visited depth-first and each bound name is replaced by the
 * next name from z, y, x, ... that is not already free in the formula. A
 * quantifier that rebinds a name shadows the outer renaming inside its body.
 */
export function standardizeVariables(node: LogicalNode): LogicalNode {
    const names = variableNames(freeNames(node));
    const renaming = new Map<string, string>();

    function renameTerm(term: Term): Term {
        if (typeof term === 'string') {
            return renaming.get(term) ?? term;
        }
        return createFunction(term.name, term.args.map(renameTerm));
    }

    function standardize(n: LogicalNode): LogicalNode {
        switch (n.type) {
            case 'forall':
            case 'exists': {
                const previous = new Map<string, string | undefined>();
                const variables = n.variables.map(oldVar => {
                    if (!previous.has(oldVar)) {
                        previous.set(oldVar, renaming.get(oldVar));
                    }
                    const newVar = names.next().value;
                    renaming.set(oldVar, newVar);
                    return newVar;
                });

                const body = standardize(n.body);

                for (const [oldVar, mapping] of previous) {
                    if (mapping === undefined) {
                        renaming.delete(oldVar);
                    } else {
                        renaming.set(oldVar, mapping);
                    }
                }

                return createQuantifier(n.type, variables, body);
            }

            case 'predicate':
                return createPredicate(n.name, n.args.map(renameTerm));

            case 'not':
                return createNot(standardize(n.operand));

            case 'and':
                return createAnd(n.terms.map(standardize));

            case 'or':
                return createOr(n.terms.map(standardize));
        }
    }

    return standardize(node);
}
