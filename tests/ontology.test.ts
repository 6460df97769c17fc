import path from 'path';
import { Ontology, loadOntology, parseOntology } from '../src/ontology/index.js';
import { createContext } from '../src/logic/sequence.js';
import { createPredicate } from '../src/ast/index.js';
import { LogicException } from '../src/types/errors.js';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

describe('Ontology', () => {
    test('records axioms and every import in order', () => {
        const ontology = new Ontology('manual');
        ontology.addAxiom(createPredicate('P', ['a']));
        ontology.addAxiom(createPredicate('Q', ['b']));
        ontology.addImport('http://example.org/base');
        ontology.addImport('http://example.org/extra');
        ontology.addImport('http://example.org/base');

        expect(ontology.axioms.map(a => a.toString())).toEqual(['P(a)', 'Q(b)']);
        expect(ontology.imports).toEqual([
            'http://example.org/base',
            'http://example.org/extra',
            'http://example.org/base',
        ]);
    });

    test('labels TPTP axioms by position', () => {
        const ontology = new Ontology('manual');
        ontology.addAxiom(createPredicate('P', ['a']));
        ontology.addAxiom(createPredicate('Q', ['b']));

        expect(ontology.toTptp({ ffpcnf: true })).toEqual([
            'fof(axiom10, axiom, p(A)).',
            'fof(axiom20, axiom, q(B)).',
        ]);
    });

    test('a shared context keeps fresh names unique across ontologies', () => {
        const context = createContext();
        const first = parseOntology('(P (f a))', 'first', context);
        const second = parseOntology('(P (f b))', 'second', context);

        expect(first?.toLadr({ ffpcnf: true })).toEqual(['(all z ((-(P(z)) | f(a,z)))).']);
        expect(second?.normalized({ ffpcnf: true }).map(a => a.toString()))
            .toEqual(['∀(z)[(~P(z) | f(b,z))]']);
        expect(context.functionNames.peek()).toBe(3);
    });

    test('normalized without ffpcnf returns the axioms as parsed', () => {
        const ontology = parseOntology('(if (P a) (Q a))');
        expect(ontology?.normalized().map(a => a.toString())).toEqual(['(~P(a) | Q(a))']);
    });
});

describe('parseOntology', () => {
    test('returns null for empty text', () => {
        expect(parseOntology('')).toBeNull();
    });

    test('propagates grammar errors', () => {
        expect(() => parseOntology('(and (P a)')).toThrow(LogicException);
    });

    test('summarizes the document', () => {
        const ontology = parseOntology(
            '(cl-text http://example.org/t (cl-imports http://example.org/u) (P a) (Q b))',
            'summary'
        );
        expect(ontology?.info()).toEqual({
            name: 'summary',
            uri: 'http://example.org/t',
            axiomCount: 2,
            imports: ['http://example.org/u'],
            diagnostics: [],
        });
    });
});

describe('loadOntology', () => {
    test('loads a file', async () => {
        const ontology = await loadOntology(fixture('scenario.clif'));

        expect(ontology?.info()).toEqual({
            name: fixture('scenario.clif'),
            uri: 'http://example.org/scenario',
            axiomCount: 2,
            imports: ['http://example.org/base'],
            diagnostics: [],
        });
    });

    test('serializes a file as parsed', async () => {
        const ontology = await loadOntology(fixture('scenario.clif'));

        expect(ontology?.serialize('tptp')).toEqual([
            'fof(axiom10, axiom, (! [X,Y,Z] : ((a(X) | (b(Y) & c(Z)))))).',
            'fof(axiom20, axiom, (! [X,Y,Z] : (((a(X) | b(Y)) & c(Z))))).',
        ]);
        expect(ontology?.serialize('ladr')).toEqual([
            '(all x all y all z ((A(x) | (B(y) & C(z))))).',
            '(all x all y all z (((A(x) | B(y)) & C(z)))).',
        ]);
    });

    test('serializes a file in FF-PCNF', async () => {
        const ontology = await loadOntology(fixture('scenario.clif'));

        expect(ontology?.serialize('tptp', { ffpcnf: true })).toEqual([
            'fof(axiom10, axiom, (! [Z,Y,X] : (((a(Z) | b(Y)) & (a(Z) | c(X)))))).',
            'fof(axiom20, axiom, (! [Z,Y,X] : ((c(X) & (a(Z) | b(Y)))))).',
        ]);
        expect(ontology?.serialize('ladr', { ffpcnf: true })).toEqual([
            '(all z all y all x (((A(z) | B(y)) & (A(z) | C(x))))).',
            '(all z all y all x ((C(x) & (A(z) | B(y))))).',
        ]);
    });

    test('an empty file gives no ontology', async () => {
        await expect(loadOntology(fixture('empty.clif'))).resolves.toBeNull();
    });

    test('a missing file gives no ontology and a warning', async () => {
        const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const missing = fixture('missing.clif');

        await expect(loadOntology(missing)).resolves.toBeNull();
        expect(stderr).toHaveBeenCalledWith(`[warn] ontology: Attempted to parse non-existent file: ${missing}`);
        stderr.mockRestore();
    });

    test('a malformed nested axiom raises a grammar error', async () => {
        await expect(loadOntology(fixture('broken.clif'))).rejects.toMatchObject({
            code: 'GRAMMAR_ERROR',
            message: "Error at line 5! Unexpected token '(': expected closing parenthesis",
        });
    });

    test('an unreadable path raises an IO error', async () => {
        const directory = path.join(__dirname, 'fixtures');
        await expect(loadOntology(directory)).rejects.toMatchObject({
            code: 'IO_ERROR',
            error: { details: { path: directory } },
        });
    });
});
