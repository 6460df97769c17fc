import type {
    ConjunctionNode,
    DisjunctionNode,
    ExistentialNode,
    FunctionNode,
    LogicalNode,
    NegationNode,
    PredicateNode,
    Term,
    UniversalNode,
} from '../types/ast.js';

export function createPredicate(name: string, args: readonly Term[]): PredicateNode {
    return { type: 'predicate', name, args: [...args] };
}

export function createFunction(name: string, args: readonly Term[]): FunctionNode {
    return { type: 'function', name, args: [...args] };
}

export function createNot(operand: LogicalNode): NegationNode {
    return { type: 'not', operand };
}

export function createAnd(terms: readonly LogicalNode[]): ConjunctionNode {
    return { type: 'and', terms: [...terms] };
}

export function createOr(terms: readonly LogicalNode[]): DisjunctionNode {
    return { type: 'or', terms: [...terms] };
}

export function createForAll(variables: readonly string[], body: LogicalNode): UniversalNode {
    return { type: 'forall', variables: [...variables], body };
}

export function createExists(variables: readonly string[], body: LogicalNode): ExistentialNode {
    return { type: 'exists', variables: [...variables], body };
}

/** (if A B) */
export function createImplication(antecedent: LogicalNode, consequent: LogicalNode): DisjunctionNode {
    return createOr([createNot(antecedent), consequent]);
}

/** (iff A B) */
export function createBiconditional(left: LogicalNode, right: LogicalNode): ConjunctionNode {
    return createAnd([
        createImplication(left, right),
        createImplication(right, left),
    ]);
}
