/**
 * Axiom - one top-level formula of an ontology and its normalization
 * pipeline.
 *
 * Converts a formula to function-free prenex conjunctive normal form
 * (FF-PCNF) in five stages, always in this order:
 * 1. Substitute functions (fresh variables plus defining atoms)
 * 2. Standardize variables (unique names per quantifier)
 * 3. Push negation (negation normal form)
 * 4. Create prenex (all quantifiers to the front)
 * 5. Distribute disjunctions (CNF matrix)
 *
 * Every stage returns a new Axiom with a new id and never touches the tree
 * it was given.
 */

import type { LogicalNode } from '../types/ast.js';
import { astToString } from '../ast/printer.js';
import { copyNode } from '../ast/nodes.js';
import { createLogger } from '../utils/logger.js';
import type { TranslationContext } from './sequence.js';
import { analyze } from './analysis.js';
import type { AxiomAnalysis } from './analysis.js';
import {
    createPrenex,
    distributeDisjunctions,
    pushNegation,
    standardizeVariables,
    substituteFunctions,
} from './transform/index.js';
import { toLadr, toTptp } from '../serializers/index.js';

const logger = createLogger('axiom');

export class Axiom {
    readonly id: number;
    readonly sentence: LogicalNode;
    readonly context: TranslationContext;
    private cachedAnalysis?: AxiomAnalysis;

    constructor(sentence: LogicalNode, context: TranslationContext) {
        this.sentence = copyNode(sentence);
        this.context = context;
        this.id = context.axiomIds.next();
    }

    private derive(sentence: LogicalNode): Axiom {
        return new Axiom(sentence, this.context);
    }

    substituteFunctions(): Axiom {
        return this.derive(substituteFunctions(this.sentence, this.context.functionNames));
    }

    standardizeVariables(): Axiom {
        return this.derive(standardizeVariables(this.sentence));
    }

    pushNegation(): Axiom {
        return this.derive(pushNegation(this.sentence));
    }

    createPrenex(): Axiom {
        return this.derive(createPrenex(this.sentence));
    }

    distributeDisjunctions(): Axiom {
        return this.derive(distributeDisjunctions(this.sentence));
    }

    /**
     * Run the whole pipeline. Run it once per axiom: the function and
     * variable names it introduces differ on a second pass.
     */
    ffPcnf(): Axiom {
        logger.debug(`Starting Axiom: ${this}`);

        const functionFree = this.substituteFunctions();
        logger.debug(`Function Free: ${functionFree}`);

        const uniqueVariables = functionFree.standardizeVariables();
        logger.debug(`Unique Variables: ${uniqueVariables}`);

        const distributedNegation = uniqueVariables.pushNegation();
        logger.debug(`Distributed Negation: ${distributedNegation}`);

        const prenexForm = distributedNegation.createPrenex();
        logger.debug(`Prenex Form: ${prenexForm}`);

        const cnf = prenexForm.distributeDisjunctions();
        logger.debug(`CNF Form: ${cnf}`);

        return cnf;
    }

    analysis(): AxiomAnalysis {
        if (!this.cachedAnalysis) {
            this.cachedAnalysis = analyze(this.sentence);
        }
        return this.cachedAnalysis;
    }

    /**
     * @param label - number used in place of the axiom's own id
     */
    toTptp(label: number = this.id): string {
        return toTptp(this.sentence, label);
    }

    toLadr(): string {
        return toLadr(this.sentence);
    }

    toString(): string {
        return astToString(this.sentence);
    }
}
