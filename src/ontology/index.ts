export { Ontology } from './ontology.js';
export { parseOntology, loadOntology } from './loader.js';
