import { ladrLogical, toLadr, toTptp, tptpLogical } from '../src/serializers/index.js';
import {
    createAnd,
    createExists,
    createForAll,
    createFunction,
    createNot,
    createOr,
    createPredicate,
} from '../src/ast/index.js';
import { LogicException } from '../src/types/errors.js';
import type { ASTNode } from '../src/types/index.js';

const sentence = createForAll(['x'], createOr([
    createNot(createPredicate('Part', ['x', 'y'])),
    createExists(['z'], createAnd([
        createPredicate('=', ['x', 'z']),
        createPredicate('Q', [createFunction('f', ['z'])]),
    ])),
]));

describe('TPTP', () => {
    test('renders a full sentence', () => {
        expect(tptpLogical(sentence)).toBe('(! [X] : ((~(part(X,Y)) | (? [Z] : ((X=Z & q(f(Z))))))))');
    });

    test('wraps a sentence as a numbered axiom', () => {
        expect(toTptp(createPredicate('P', ['a']), 3)).toBe('fof(axiom30, axiom, p(A)).');
    });

    test('negates compound formulas without extra parentheses', () => {
        const node = createNot(createAnd([createPredicate('P', ['a']), createPredicate('Q', ['b'])]));
        expect(tptpLogical(node)).toBe('~(p(A) & q(B))');
    });

    test('renders double negation as the formula itself', () => {
        const node = createNot(createNot(createNot(createPredicate('P', ['a']))));
        expect(tptpLogical(node)).toBe('~(p(A))');
    });

    test('lists several quantified variables', () => {
        expect(tptpLogical(createExists(['x', 'y'], createPredicate('R', ['x', 'y'])))).toBe('(? [X,Y] : (r(X,Y)))');
    });
});

describe('LADR', () => {
    test('renders a full sentence', () => {
        expect(ladrLogical(sentence)).toBe('(all x ((-(Part(x,y)) | (exists z ((x = z & Q(f(z))))))))');
    });

    test('ends an axiom with a period', () => {
        expect(toLadr(createPredicate('P', ['a']))).toBe('P(a).');
    });

    test('repeats the quantifier for every variable', () => {
        expect(toLadr(createForAll(['x', 'y'], createPredicate('R', ['x', 'y'])))).toBe('(all x all y (R(x,y))).');
    });

    test('negates compound formulas', () => {
        const node = createNot(createOr([createPredicate('P', ['a']), createPredicate('Q', ['b'])]));
        expect(ladrLogical(node)).toBe('-(P(a) | Q(b))');
    });

    test('renders double negation as the formula itself', () => {
        expect(toLadr(createNot(createNot(createPredicate('P', ['a']))))).toBe('P(a).');
    });
});

describe('unknown node types', () => {
    const bogus: ASTNode = JSON.parse('{"type":"implies","terms":[]}');

    test.each([
        ['TPTP', tptpLogical],
        ['LADR', ladrLogical],
    ])('%s raises a serialization error', (format, serialize) => {
        let caught: unknown;
        try {
            serialize(bogus);
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(LogicException);
        if (caught instanceof LogicException) {
            expect(caught.code).toBe('SERIALIZATION_ERROR');
            expect(caught.message).toBe(`Not a valid type for ${format} output: implies`);
        }
    });
});
