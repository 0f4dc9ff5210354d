import { createNode, TreeNode } from './types.js';

/**
 * Sample tree rendered when no tree file is given.
 *
 *         10
 *        /  \
 *       5    15
 *      / \     \
 *     2   7     20
 */
export function buildExampleTree(): TreeNode {
  return createNode(
    10,
    createNode(5, createNode(2), createNode(7)),
    createNode(15, undefined, createNode(20))
  );
}
