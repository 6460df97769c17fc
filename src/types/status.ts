/**
 * Outcome of a reasoner run, read from its output.
 */
export type ReasonerStatus =
    | 'PROOF'
    | 'INCONSISTENT'
    | 'COUNTEREXAMPLE'
    | 'CONSISTENT'
    | 'UNKNOWN'
    | 'ERROR';

export type ReasonerName = 'prover9' | 'mace4' | 'vampire' | 'paradox';

export const REASONERS: readonly ReasonerName[] = ['prover9', 'mace4', 'vampire', 'paradox'];
