export { substituteFunctions } from './functions.js';
export { standardizeVariables } from './standardize.js';
export { pushNegation } from './nnf.js';
export { createPrenex } from './prenex.js';
export { distributeDisjunctions } from './distribute.js';
