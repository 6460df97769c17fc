/**
 * Monotonic integer sequence. Never resets; share one instance wherever
 * numbers must stay unique.
 */
export class Sequence {
    private value: number;

    constructor(start: number = 1) {
        this.value = start;
    }

    next(): number {
        return this.value++;
    }

    peek(): number {
        return this.value;
    }
}

/**
 * Counters threaded through the pipeline: axiom ids and the suffixes of
 * variables that replace function applications.
 */
export interface TranslationContext {
    readonly axiomIds: Sequence;
    readonly functionNames: Sequence;
}

export function createContext(): TranslationContext {
    return {
        axiomIds: new Sequence(),
        functionNames: new Sequence(),
    };
}

const ALPHABET = 'zyxwvutsrqponmlkjihgfedcba';

/**
 * Names for standardized variables: z, y, ..., a, then z1, ..., a1, z2, ...
 * Names in `reserved` are skipped.
 */
export function* variableNames(reserved: ReadonlySet<string> = new Set()): Generator<string, never> {
    for (let round = 0; ; round++) {
        for (const letter of ALPHABET) {
            const name = round === 0 ? letter : `${letter}${round}`;
            if (!reserved.has(name)) {
                yield name;
            }
        }
    }
}
