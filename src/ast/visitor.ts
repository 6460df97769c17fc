import type { ASTNode } from '../types/ast.js';
import { children } from './nodes.js';

/**
 * Generic AST Visitor. Calls `visitor` on every node, parents before
 * children, passing the enclosing node (null at the root).
 */
export function traverse(
    node: ASTNode,
    visitor: (node: ASTNode, parent: ASTNode | null) => void,
    parent: ASTNode | null = null
): void {
    visitor(node, parent);
    for (const child of children(node)) {
        traverse(child, visitor, node);
    }
}

/**
 * Count nodes of a given type, e.g. to check that no functions remain.
 */
export function countNodes(node: ASTNode, type?: ASTNode['type']): number {
    let count = 0;
    traverse(node, n => {
        if (type === undefined || n.type === type) count++;
    });
    return count;
}
