import { createSerializationError } from '../types/errors.js';

function describe(value: unknown): string {
    if (typeof value === 'object' && value !== null && 'type' in value) {
        return String(value.type);
    }
    return typeof value;
}

/**
 * Reached only when a node outside the closed AST variants slips through.
 */
export function unsupportedNode(node: never, format: string): never {
    throw createSerializationError(format, describe(node));
}
