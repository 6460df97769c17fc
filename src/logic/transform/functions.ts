import type { FunctionNode, LogicalNode, PredicateNode, Term } from '../../types/ast.js';
import {
    createAnd,
    createForAll,
    createNot,
    createOr,
    createPredicate,
} from '../../ast/factory.js';
import { createQuantifier } from '../../ast/nodes.js';
import { traverse } from '../../ast/visitor.js';
import { freeNames } from '../analysis.js';
import type { Sequence } from '../sequence.js';

/**
 * Replace nested function applications with fresh variables.
 *
 * A predicate P(..., f(t), ...) becomes
 *   ∀(V)[~P(..., f1, ...) | f(t, f1)]
 * where f1 is a fresh name (function name plus a number from `names`) and
 * f(t, f1) is the defining atom, the function read as a relation with the
 * value as its last argument. Fresh names are handed out outermost first;
 * defining atoms are listed innermost first and joined by a conjunction when
 * there is more than one. V holds the predicate's new arguments that are
 * bound variables or fresh names, followed by any other fresh names.
 * Numbers are skipped while the candidate name already occurs in the axiom.
 */
export function substituteFunctions(node: LogicalNode, names: Sequence): LogicalNode {
    const taken = usedNames(node);
    const freshName = (fn: FunctionNode): string => {
        let name = `${fn.name}${names.next()}`;
        while (taken.has(name)) {
            name = `${fn.name}${names.next()}`;
        }
        return name;
    };

    function substitute(n: LogicalNode, bound: ReadonlySet<string>): LogicalNode {
        switch (n.type) {
            case 'predicate':
                return replaceInPredicate(n, bound, freshName);

            case 'not':
                return createNot(substitute(n.operand, bound));

            case 'and':
                return createAnd(n.terms.map(t => substitute(t, bound)));

            case 'or':
                return createOr(n.terms.map(t => substitute(t, bound)));

            case 'forall':
            case 'exists': {
                const inner = new Set([...bound, ...n.variables]);
                return createQuantifier(n.type, n.variables, substitute(n.body, inner));
            }
        }
    }

    return substitute(node, new Set());
}

/**
 * Every quantified variable plus every free name of the axiom.
 */
function usedNames(node: LogicalNode): Set<string> {
    const used = freeNames(node);
    traverse(node, n => {
        if (n.type === 'forall' || n.type === 'exists') {
            n.variables.forEach(v => used.add(v));
        }
    });
    return used;
}

function replaceInPredicate(
    predicate: PredicateNode,
    bound: ReadonlySet<string>,
    freshName: (fn: FunctionNode) => string
): LogicalNode {
    if (predicate.args.every(arg => typeof arg === 'string')) {
        return createPredicate(predicate.name, predicate.args);
    }

    const fresh: string[] = [];
    const definitions: PredicateNode[] = [];

    const replace = (fn: FunctionNode): string => {
        const name = freshName(fn);
        fresh.push(name);
        const args = fn.args.map(replaceTerm);
        definitions.push(createPredicate(fn.name, [...args, name]));
        return name;
    };

    const replaceTerm = (term: Term): string => (typeof term === 'string' ? term : replace(term));

    const args = predicate.args.map(replaceTerm);
    const freshNames = new Set(fresh);
    const variables: string[] = [];
    for (const name of [...args.filter(a => bound.has(a) || freshNames.has(a)), ...fresh]) {
        if (!variables.includes(name)) variables.push(name);
    }

    const definition = definitions.length === 1 ? definitions[0] : createAnd(definitions);
    return createForAll(variables, createOr([createNot(createPredicate(predicate.name, args)), definition]));
}
