export { toTptp, tptpLogical } from './tptp.js';
export { toLadr, ladrLogical } from './ladr.js';
