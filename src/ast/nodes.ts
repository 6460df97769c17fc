import type {
    ASTNode,
    ConjunctionNode,
    ConnectiveNode,
    LogicalNode,
    QuantifierNode,
    Term,
} from '../types/ast.js';
import {
    createAnd,
    createExists,
    createForAll,
    createFunction,
    createNot,
    createOr,
    createPredicate,
} from './factory.js';

export function isQuantifier(node: ASTNode): node is QuantifierNode {
    return node.type === 'forall' || node.type === 'exists';
}

export function isConnective(node: ASTNode): node is ConnectiveNode {
    return node.type === 'and' || node.type === 'or';
}

/** A predicate or a negated predicate */
export function isLiteral(node: ASTNode): boolean {
    return node.type === 'predicate'
        || (node.type === 'not' && node.operand.type === 'predicate');
}

function copyTerm(term: Term): Term {
    return typeof term === 'string' ? term : copyNode(term);
}

/**
 * Structural deep copy.
 */
export function copyNode<T extends ASTNode>(node: T): T;
export function copyNode(node: ASTNode): ASTNode {
    switch (node.type) {
        case 'predicate':
            return createPredicate(node.name, node.args.map(copyTerm));
        case 'function':
            return createFunction(node.name, node.args.map(copyTerm));
        case 'not':
            return createNot(copyNode(node.operand));
        case 'and':
            return createAnd(node.terms.map(t => copyNode(t)));
        case 'or':
            return createOr(node.terms.map(t => copyNode(t)));
        case 'forall':
            return createForAll(node.variables, copyNode(node.body));
        case 'exists':
            return createExists(node.variables, copyNode(node.body));
    }
}

/**
 * Immediate child nodes. Plain variable/constant arguments are not nodes.
 */
export function children(node: ASTNode): ASTNode[] {
    switch (node.type) {
        case 'predicate':
        case 'function':
            return node.args.filter((arg): arg is Exclude<Term, string> => typeof arg !== 'string');
        case 'not':
            return [node.operand];
        case 'and':
        case 'or':
            return [...node.terms];
        case 'forall':
        case 'exists':
            return [node.body];
    }
}

function asFormula(node: ASTNode): LogicalNode {
    if (node.type === 'function') {
        throw new TypeError(`Function '${node.name}' cannot stand as a formula`);
    }
    return node;
}

/**
 * Rebuild a node with new immediate children, in the order `children` lists
 * them. Variable arguments of predicates and functions keep their places.
 */
export function replaceChildren<T extends ASTNode>(node: T, replacements: readonly ASTNode[]): T;
export function replaceChildren(node: ASTNode, replacements: readonly ASTNode[]): ASTNode {
    const expected = children(node).length;
    if (replacements.length !== expected) {
        throw new RangeError(`Expected ${expected} children for '${node.type}', got ${replacements.length}`);
    }

    switch (node.type) {
        case 'predicate':
        case 'function': {
            let next = 0;
            const args = node.args.map((arg): Term => {
                if (typeof arg === 'string') return arg;
                const replacement = replacements[next++];
                if (replacement.type !== 'function') {
                    throw new TypeError(`Argument of '${node.name}' must be a function, got '${replacement.type}'`);
                }
                return replacement;
            });
            return node.type === 'predicate'
                ? createPredicate(node.name, args)
                : createFunction(node.name, args);
        }
        case 'not':
            return createNot(asFormula(replacements[0]));
        case 'and':
            return createAnd(replacements.map(asFormula));
        case 'or':
            return createOr(replacements.map(asFormula));
        case 'forall':
            return createForAll(node.variables, asFormula(replacements[0]));
        case 'exists':
            return createExists(node.variables, asFormula(replacements[0]));
    }
}

export function createQuantifier(
    type: QuantifierNode['type'],
    variables: readonly string[],
    body: LogicalNode
): QuantifierNode {
    return type === 'forall' ? createForAll(variables, body) : createExists(variables, body);
}

export function createConnective(type: ConnectiveNode['type'], terms: readonly LogicalNode[]): ConnectiveNode {
    return type === 'and' ? createAnd(terms) : createOr(terms);
}

/**
 * Merge a quantifier with directly nested quantifiers of the same kind:
 * ∀x[∀y[P]] becomes ∀x,y[P].
 */
export function coalesce(quantifier: QuantifierNode): QuantifierNode {
    let variables = [...quantifier.variables];
    let body = quantifier.body;

    while (body.type === quantifier.type) {
        variables = variables.concat(body.variables);
        body = body.body;
    }

    return createQuantifier(quantifier.type, variables, body);
}

/**
 * Move a quantifier above its enclosing connective. The quantifier's body
 * takes its place among the connective's terms.
 *
 * Only sound once bound names are unique within the axiom: any other term of
 * the connective that mentions a bound name would be captured.
 */
export function rescope(quantifier: QuantifierNode, parent: ConnectiveNode): QuantifierNode {
    const index = parent.terms.indexOf(quantifier);
    if (index === -1) {
        throw new RangeError('Quantifier is not a term of the given connective');
    }

    const terms = parent.terms.map((term, i) => (i === index ? quantifier.body : term));
    return createQuantifier(quantifier.type, quantifier.variables, createConnective(parent.type, terms));
}

/**
 * Collapse a quantifier prefix so that adjacent wrappers of the same kind
 * become one, dropping names a wrapper already binds.
 */
export function simplify(node: LogicalNode): LogicalNode {
    if (!isQuantifier(node)) {
        return node;
    }

    const merged = coalesce(node);
    const variables = merged.variables.filter((v, i) => merged.variables.indexOf(v) === i);
    return createQuantifier(merged.type, variables, simplify(merged.body));
}

function flatten(type: ConnectiveNode['type'], terms: readonly LogicalNode[]): LogicalNode[] {
    return terms.flatMap(term => (isConnective(term) && term.type === type ? flatten(type, term.terms) : [term]));
}

/**
 * Distribute disjunction over conjunction until no disjunction has a
 * conjunction as a direct term: A ∨ (B ∧ C) becomes (A ∨ B) ∧ (A ∨ C).
 *
 * Nested connectives of the same kind are flattened. In each distributed
 * disjunction the terms that are not conjunctions come first.
 */
export function distributeOverDisjunction(node: LogicalNode): LogicalNode {
    switch (node.type) {
        case 'predicate':
        case 'not':
            return node;

        case 'forall':
        case 'exists':
            return createQuantifier(node.type, node.variables, distributeOverDisjunction(node.body));

        case 'and':
            return createAnd(flatten('and', node.terms.map(distributeOverDisjunction)));

        case 'or': {
            const terms = flatten('or', node.terms.map(distributeOverDisjunction));
            const plain = terms.filter(t => t.type !== 'and');
            const conjunctions = terms.filter((t): t is ConjunctionNode => t.type === 'and');

            if (conjunctions.length === 0) {
                return createOr(terms);
            }

            // Every way of picking one conjunct from each conjunction
            let clauses: LogicalNode[][] = [plain];
            for (const conjunction of conjunctions) {
                clauses = clauses.flatMap(clause => conjunction.terms.map(conjunct => [...clause, conjunct]));
            }

            return createAnd(flatten('and', clauses.map(clause => distributeOverDisjunction(createOr(clause)))));
        }
    }
}
