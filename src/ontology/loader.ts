import fs from 'fs/promises';
import { parse } from '../parser/index.js';
import { createIoError } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';
import type { TranslationContext } from '../logic/sequence.js';
import { Ontology } from './ontology.js';

const logger = createLogger('ontology');

/**
 * Build an ontology from CLIF text. Returns null for empty input.
 * Grammar errors propagate; nothing partial is returned.
 */
export function parseOntology(
    text: string,
    name: string = 'ontology',
    context?: TranslationContext
): Ontology | null {
    const document = parse(text);
    if (document === null) {
        return null;
    }

    const ontology = new Ontology(name, context);
    ontology.uri = document.uri;
    document.axioms.forEach(axiom => ontology.addAxiom(axiom));
    document.imports.forEach(uri => ontology.addImport(uri));
    ontology.addDiagnostics(document.diagnostics);

    logger.info(`Parsed ${name}: ${ontology.axioms.length} axioms, ${ontology.imports.length} imports`);
    return ontology;
}

/**
 * Read and parse a CLIF file. A missing or empty file gives null.
 */
export async function loadOntology(path: string, context?: TranslationContext): Promise<Ontology | null> {
    let text: string;
    try {
        text = await fs.readFile(path, 'utf-8');
    } catch (e) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
            logger.warn(`Attempted to parse non-existent file: ${path}`);
            return null;
        }
        const message = e instanceof Error ? e.message : String(e);
        throw createIoError(`Could not read ${path}: ${message}`, path);
    }

    if (!text) {
        return null;
    }

    return parseOntology(text, path, context);
}
