/**
 * Abstract Syntax Tree (AST) Types for CLIF axioms
 *
 * The node set is closed: every traversal switches on `type` and must handle
 * all seven variants.
 */

export type ASTNodeType =
    | 'predicate'
    | 'function'
    | 'not'
    | 'and'
    | 'or'
    | 'forall'
    | 'exists';

/**
 * Argument of a predicate or function: a variable/constant name or a nested
 * function application.
 */
export type Term = string | FunctionNode;

export interface PredicateNode {
    readonly type: 'predicate';
    /** '=' marks equality */
    readonly name: string;
    readonly args: readonly Term[];
}

export interface FunctionNode {
    readonly type: 'function';
    readonly name: string;
    readonly args: readonly Term[];
}

export interface NegationNode {
    readonly type: 'not';
    readonly operand: LogicalNode;
}

export interface ConjunctionNode {
    readonly type: 'and';
    readonly terms: readonly LogicalNode[];
}

export interface DisjunctionNode {
    readonly type: 'or';
    readonly terms: readonly LogicalNode[];
}

export interface UniversalNode {
    readonly type: 'forall';
    readonly variables: readonly string[];
    readonly body: LogicalNode;
}

export interface ExistentialNode {
    readonly type: 'exists';
    readonly variables: readonly string[];
    readonly body: LogicalNode;
}

export type ConnectiveNode = ConjunctionNode | DisjunctionNode;
export type QuantifierNode = UniversalNode | ExistentialNode;

/** Any node that can stand as a formula */
export type LogicalNode =
    | PredicateNode
    | NegationNode
    | ConjunctionNode
    | DisjunctionNode
    | UniversalNode
    | ExistentialNode;

export type ASTNode = LogicalNode | FunctionNode;
