/**
 * clif-translate - Library Entry Point
 *
 * CLIF parsing, FF-PCNF normalization and TPTP/LADR serialization. Nothing
 * here reads files except `loadOntology`.
 */

// Parser
export { parse, Tokenizer, Parser, reconstructBrokenAxiom } from './parser/index.js';

// AST
export * from './ast/index.js';

// Pipeline
export { Axiom } from './logic/axiom.js';
export { Sequence, createContext, variableNames } from './logic/sequence.js';
export type { TranslationContext } from './logic/sequence.js';
export { analyze, freeNames } from './logic/analysis.js';
export type { AxiomAnalysis } from './logic/analysis.js';
export * from './logic/transform/index.js';

// Serializers
export * from './serializers/index.js';

// Ontology
export { Ontology, parseOntology, loadOntology } from './ontology/index.js';

// Reasoner output
export {
    classifyOutput,
    isReasonerName,
    terminatedSuccessfully,
    terminatedWithError,
    terminatedUnknowingly,
} from './reasoners/status.js';

// Configuration and logging
export { loadConfig } from './config.js';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger.js';

// Types and Interfaces
export * from './types/index.js';
