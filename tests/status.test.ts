import {
    classifyOutput,
    isReasonerName,
    terminatedSuccessfully,
    terminatedUnknowingly,
    terminatedWithError,
} from '../src/reasoners/status.js';
import type { ReasonerStatus } from '../src/types/index.js';

describe('classifyOutput', () => {
    describe('prover9', () => {
        test('THEOREM PROVED is a proof', () => {
            expect(classifyOutput('prover9', '===== PROOF =====\nTHEOREM PROVED\n')).toBe('PROOF');
        });

        test('anything else is unknown', () => {
            expect(classifyOutput('prover9', 'SEARCH FAILED\n')).toBe('UNKNOWN');
            expect(classifyOutput('prover9', '')).toBe('UNKNOWN');
        });
    });

    describe('mace4', () => {
        test('one model means consistent', () => {
            expect(classifyOutput('mace4', 'interpretation( 2 ).\nExiting with 1 model.\n')).toBe('CONSISTENT');
        });

        test('no model is unknown', () => {
            expect(classifyOutput('mace4', 'Exiting, max_seconds limit.\n')).toBe('UNKNOWN');
        });
    });

    describe('vampire', () => {
        test.each<[string, ReasonerStatus]>([
            ['Termination reason: Refutation', 'PROOF'],
            ['Termination reason: Refutation not found, incomplete strategy', 'UNKNOWN'],
            ['Termination reason: Unsatisfiable', 'INCONSISTENT'],
            ['Termination reason: CounterSatisfiable', 'COUNTEREXAMPLE'],
            ['Termination reason: Satisfiable', 'CONSISTENT'],
            ['Termination reason: Time limit', 'UNKNOWN'],
        ])('%s gives %s', (line, status) => {
            expect(classifyOutput('vampire', `% Running in auto input_syntax mode\n${line}\n`)).toBe(status);
        });

        test('only the last termination reason counts', () => {
            const output = [
                'Termination reason: Time limit',
                '% restarting',
                'Termination reason: Satisfiable',
            ].join('\n');
            expect(classifyOutput('vampire', output)).toBe('CONSISTENT');
        });

        test('a parser exception turns an unknown result into an error', () => {
            const output = 'Parser exception: unexpected token\nTermination reason: Unknown\n';
            expect(classifyOutput('vampire', output)).toBe('ERROR');
        });

        test('a parser exception does not override a definite result', () => {
            const output = 'Parser exception: recovered\nTermination reason: Refutation\n';
            expect(classifyOutput('vampire', output)).toBe('PROOF');
        });

        test('no termination reason is unknown', () => {
            expect(classifyOutput('vampire', 'Parser exception: bad input\n')).toBe('UNKNOWN');
        });

        test('accepts Windows line endings', () => {
            expect(classifyOutput('vampire', 'x\r\nTermination reason: Refutation\r\n')).toBe('PROOF');
        });
    });

    describe('paradox', () => {
        test.each<[string, ReasonerStatus]>([
            ['+++ RESULT: Theorem', 'PROOF'],
            ['+++ RESULT: Unsatisfiable', 'INCONSISTENT'],
            ['+++ RESULT: CounterSatisfiable', 'COUNTEREXAMPLE'],
            ['+++ RESULT: Satisfiable', 'CONSISTENT'],
            ['+++ RESULT: GaveUp', 'UNKNOWN'],
        ])('%s gives %s', (line, status) => {
            expect(classifyOutput('paradox', `Paradox, version 4.0\n${line}\n`)).toBe(status);
        });

        test('an unexpected failure without a result is an error', () => {
            expect(classifyOutput('paradox', '*** Unexpected: out of memory\n')).toBe('ERROR');
        });

        test('no result is unknown', () => {
            expect(classifyOutput('paradox', 'Paradox, version 4.0\n')).toBe('UNKNOWN');
        });

        test('more than one result line is unknown', () => {
            expect(classifyOutput('paradox', '+++ RESULT: Satisfiable\n+++ RESULT: Theorem\n')).toBe('UNKNOWN');
        });
    });

    test('reasoners without an output grammar give unknown', () => {
        expect(classifyOutput('eprover', 'SZS status Theorem')).toBe('UNKNOWN');
    });
});

describe('isReasonerName', () => {
    test('accepts known reasoners only', () => {
        expect(isReasonerName('vampire')).toBe(true);
        expect(isReasonerName('Vampire')).toBe(false);
    });
});

describe('termination predicates', () => {
    test.each<[ReasonerStatus, boolean, boolean, boolean]>([
        ['PROOF', true, false, false],
        ['INCONSISTENT', true, false, false],
        ['COUNTEREXAMPLE', true, false, false],
        ['CONSISTENT', true, false, false],
        ['UNKNOWN', false, false, true],
        ['ERROR', false, true, false],
    ])('%s', (status, success, error, unknown) => {
        expect(terminatedSuccessfully(status)).toBe(success);
        expect(terminatedWithError(status)).toBe(error);
        expect(terminatedUnknowingly(status)).toBe(unknown);
    });
});
