import type { LogicalNode } from '../../types/ast.js';
import { copyNode, distributeOverDisjunction } from '../../ast/nodes.js';

/**
 * Bring the matrix of a prenex formula into conjunctive normal form.
 * (A ∨ (B ∧ C)) → (A ∨ B) ∧ (A ∨ C)
 */
export function distributeDisjunctions(node: LogicalNode): LogicalNode {
    return distributeOverDisjunction(copyNode(node));
}
