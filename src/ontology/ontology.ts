import type { LogicalNode } from '../types/ast.js';
import type { LogicError } from '../types/errors.js';
import type { OntologyInfo, SerializeOptions } from '../types/ontology.js';
import type { OutputFormat } from '../types/options.js';
import { Axiom } from '../logic/axiom.js';
import { createContext } from '../logic/sequence.js';
import type { TranslationContext } from '../logic/sequence.js';

/**
 * A parsed CLIF document: its axioms in file order and the URIs it imports.
 * Imports keep their file order, repeats included. They are never resolved.
 */
export class Ontology {
    readonly name: string;
    uri?: string;
    readonly context: TranslationContext;
    private readonly axiomList: Axiom[] = [];
    private readonly importList: string[] = [];
    private readonly diagnosticList: LogicError[] = [];

    /**
     * @param context - share one context between ontologies to keep
     *                  generated names unique across them
     */
    constructor(name: string, context: TranslationContext = createContext()) {
        this.name = name;
        this.context = context;
    }

    get axioms(): readonly Axiom[] {
        return this.axiomList;
    }

    get imports(): readonly string[] {
        return this.importList;
    }

    get diagnostics(): readonly LogicError[] {
        return this.diagnosticList;
    }

    addAxiom(sentence: LogicalNode): Axiom {
        const axiom = new Axiom(sentence, this.context);
        this.axiomList.push(axiom);
        return axiom;
    }

    addImport(uri: string): void {
        this.importList.push(uri);
    }

    addDiagnostics(diagnostics: readonly LogicError[]): void {
        this.diagnosticList.push(...diagnostics);
    }

    /**
     * Axioms as they will be serialized, converted to FF-PCNF when asked.
     */
    normalized(options: SerializeOptions = {}): Axiom[] {
        return options.ffpcnf ? this.axiomList.map(a => a.ffPcnf()) : [...this.axiomList];
    }

    /**
     * One fof(...) line per axiom, labelled by position: axiom10, axiom20, ...
     */
    toTptp(options: SerializeOptions = {}): string[] {
        return this.normalized(options).map((axiom, index) => axiom.toTptp(index + 1));
    }

    toLadr(options: SerializeOptions = {}): string[] {
        return this.normalized(options).map(axiom => axiom.toLadr());
    }

    serialize(format: OutputFormat, options: SerializeOptions = {}): string[] {
        return format === 'tptp' ? this.toTptp(options) : this.toLadr(options);
    }

    info(): OntologyInfo {
        return {
            name: this.name,
            uri: this.uri,
            axiomCount: this.axiomList.length,
            imports: [...this.importList],
            diagnostics: [...this.diagnosticList],
        };
    }
}
