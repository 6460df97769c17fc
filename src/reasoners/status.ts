import type { ReasonerName, ReasonerStatus } from '../types/status.js';
import { REASONERS } from '../types/status.js';

type Classifier = (lines: string[]) => ReasonerStatus;

function linesStartingWith(lines: string[], prefix: string): string[] {
    return lines.filter(line => line.startsWith(prefix));
}

/**
 * Status keywords shared by Paradox and Vampire result lines.
 * CounterSatisfiable is tested before Satisfiable, which it contains.
 */
function szsStatus(line: string): ReasonerStatus {
    if (line.includes('Unsatisfiable')) return 'INCONSISTENT';
    if (line.includes('CounterSatisfiable')) return 'COUNTEREXAMPLE';
    if (line.includes('Satisfiable')) return 'CONSISTENT';
    // Timeout, GaveUp
    return 'UNKNOWN';
}

const prover9: Classifier = lines =>
    linesStartingWith(lines, 'THEOREM PROVED').length > 0 ? 'PROOF' : 'UNKNOWN';

const mace4: Classifier = lines =>
    lines.some(line => line.startsWith('Exiting with 1 model.')) ? 'CONSISTENT' : 'UNKNOWN';

const vampire: Classifier = lines => {
    const terminations = linesStartingWith(lines, 'Termination reason:');
    if (terminations.length === 0) {
        return 'UNKNOWN';
    }

    // Vampire restarts in competition mode; only the last reason counts
    const last = terminations[terminations.length - 1];
    let status: ReasonerStatus;
    if (last.includes('Refutation not found')) status = 'UNKNOWN';
    else if (last.includes('Refutation')) status = 'PROOF';
    else status = szsStatus(last);

    if (status === 'UNKNOWN' && linesStartingWith(lines, 'Parser exception:').length > 0) {
        return 'ERROR';
    }
    return status;
};

const paradox: Classifier = lines => {
    const results = linesStartingWith(lines, '+++ RESULT:');
    if (results.length !== 1) {
        return linesStartingWith(lines, '*** Unexpected:').length > 0 ? 'ERROR' : 'UNKNOWN';
    }
    return results[0].includes('Theorem') ? 'PROOF' : szsStatus(results[0]);
};

const CLASSIFIERS: Record<ReasonerName, Classifier> = {
    prover9,
    mace4,
    vampire,
    paradox,
};

export function isReasonerName(name: string): name is ReasonerName {
    return REASONERS.some(r => r === name);
}

/**
 * Classify the textual output of a reasoner. Unsupported reasoners give
 * UNKNOWN.
 */
export function classifyOutput(reasoner: string, output: string): ReasonerStatus {
    if (!isReasonerName(reasoner)) {
        return 'UNKNOWN';
    }
    return CLASSIFIERS[reasoner](output.split(/\r?\n/));
}

/**
 * True for a definite answer: proof, inconsistency, counterexample or
 * consistency.
 */
export function terminatedSuccessfully(status: ReasonerStatus): boolean {
    return status !== 'UNKNOWN' && status !== 'ERROR';
}

export function terminatedWithError(status: ReasonerStatus): boolean {
    return status === 'ERROR';
}

export function terminatedUnknowingly(status: ReasonerStatus): boolean {
    return status === 'UNKNOWN';
}
