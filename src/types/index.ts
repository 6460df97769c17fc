/**
 * Shared type definitions
 */

// Re-export error types
export {
    LogicException,
    getSuggestion,
    createLexError,
    createGrammarError,
    createSerializationError,
    createConfigError,
    createIoError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export AST types
export type {
    ASTNode,
    ASTNodeType,
    Term,
    LogicalNode,
    PredicateNode,
    FunctionNode,
    NegationNode,
    ConjunctionNode,
    DisjunctionNode,
    UniversalNode,
    ExistentialNode,
    ConnectiveNode,
    QuantifierNode,
} from './ast.js';

export type { Token, TokenType, ParsedDocument } from './parser.js';
export type { OntologyInfo, SerializeOptions } from './ontology.js';
export type { OutputFormat, LogLevel, TranslationOptions, TranslatorConfig } from './options.js';
export { DEFAULTS } from './options.js';
export type { ReasonerName, ReasonerStatus } from './status.js';
export { REASONERS } from './status.js';
