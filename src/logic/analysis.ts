import type { LogicalNode, PredicateNode, QuantifierNode, Term } from '../types/ast.js';

/**
 * Indexed facts about the predicates, quantifiers and constants of a formula.
 */
export interface AxiomAnalysis {
    unaryPredicates: PredicateNode[];
    binaryPredicates: PredicateNode[];
    naryPredicates: PredicateNode[];
    negatedPredicates: PredicateNode[];
    positivePredicates: PredicateNode[];
    universalQuantifiers: QuantifierNode[];
    existentialQuantifiers: QuantifierNode[];
    universalVariables: string[];
    existentialVariables: string[];
    /** Names used as arguments without being bound by any enclosing quantifier */
    constants: string[];
}

/**
 * Names that occur free: arguments (at any function depth) not bound by an
 * enclosing quantifier.
 */
export function freeNames(node: LogicalNode): Set<string> {
    const free = new Set<string>();

    function visitTerm(term: Term, bound: ReadonlySet<string>): void {
        if (typeof term === 'string') {
            if (!bound.has(term)) free.add(term);
            return;
        }
        term.args.forEach(arg => visitTerm(arg, bound));
    }

    function visit(n: LogicalNode, bound: ReadonlySet<string>): void {
        switch (n.type) {
            case 'predicate':
                n.args.forEach(arg => visitTerm(arg, bound));
                return;
            case 'not':
                visit(n.operand, bound);
                return;
            case 'and':
            case 'or':
                n.terms.forEach(t => visit(t, bound));
                return;
            case 'forall':
            case 'exists':
                visit(n.body, new Set([...bound, ...n.variables]));
                return;
        }
    }

    visit(node, new Set());
    return free;
}

export function analyze(node: LogicalNode): AxiomAnalysis {
    const analysis: AxiomAnalysis = {
        unaryPredicates: [],
        binaryPredicates: [],
        naryPredicates: [],
        negatedPredicates: [],
        positivePredicates: [],
        universalQuantifiers: [],
        existentialQuantifiers: [],
        universalVariables: [],
        existentialVariables: [],
        constants: [...freeNames(node)],
    };

    function visit(n: LogicalNode, negated: boolean): void {
        switch (n.type) {
            case 'predicate': {
                (negated ? analysis.negatedPredicates : analysis.positivePredicates).push(n);
                if (n.args.length === 1) analysis.unaryPredicates.push(n);
                else if (n.args.length === 2) analysis.binaryPredicates.push(n);
                else analysis.naryPredicates.push(n);
                return;
            }
            case 'not':
                visit(n.operand, true);
                return;
            case 'and':
            case 'or':
                n.terms.forEach(t => visit(t, false));
                return;
            case 'forall':
                analysis.universalQuantifiers.push(n);
                analysis.universalVariables.push(...n.variables);
                visit(n.body, false);
                return;
            case 'exists':
                analysis.existentialQuantifiers.push(n);
                analysis.existentialVariables.push(...n.variables);
                visit(n.body, false);
                return;
        }
    }

    visit(node, false);
    return analysis;
}
