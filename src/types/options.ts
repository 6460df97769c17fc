export type OutputFormat = 'tptp' | 'ladr';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface TranslationOptions {
    /** Target prover syntax */
    format?: OutputFormat;
    /** Convert every axiom to function-free prenex CNF before serializing */
    ffpcnf?: boolean;
}

export interface TranslatorConfig extends Required<TranslationOptions> {
    logLevel: LogLevel;
}

export const DEFAULTS = {
    format: 'tptp',
    ffpcnf: false,
    logLevel: 'warn',
    /** TPTP axiom labels are the axiom number times this factor */
    tptpIdFactor: 10,
} as const;
