import type { LogicError } from './errors.js';

export interface OntologyInfo {
    /** File path or caller-chosen name */
    name: string;
    /** URI of a surrounding (cl-text ...) form */
    uri?: string;
    axiomCount: number;
    imports: string[];
    diagnostics: LogicError[];
}

export interface SerializeOptions {
    /** Convert each axiom to FF-PCNF first */
    ffpcnf?: boolean;
}
