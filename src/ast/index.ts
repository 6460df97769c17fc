export * from './factory.js';
export * from './nodes.js';
export { astToString } from './printer.js';
export { traverse, countNodes } from './visitor.js';
