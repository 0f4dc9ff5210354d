/**
 * Binary tree model consumed by the site generator
 */

/**
 * One tree element. Children are owned by exactly one parent; the generator
 * only reads nodes.
 */
export interface TreeNode {
  /** Signed integer; duplicates and negatives are allowed */
  readonly value: number;
  readonly left?: TreeNode;
  readonly right?: TreeNode;
}

export type ChildSide = 'left' | 'right';

/** Children in traversal order */
export const CHILD_SIDES: readonly ChildSide[] = ['left', 'right'];

export function createNode(value: number, left?: TreeNode, right?: TreeNode): TreeNode {
  return { value, left, right };
}

export function getChild(node: TreeNode, side: ChildSide): TreeNode | undefined {
  return side === 'left' ? node.left : node.right;
}

export function countNodes(node: TreeNode | undefined): number {
  if (!node) {
    return 0;
  }
  return 1 + countNodes(node.left) + countNodes(node.right);
}

/**
 * Number of edges on the longest root-to-leaf path (0 for a single node)
 */
export function treeHeight(node: TreeNode): number {
  const heights = CHILD_SIDES.map((side) => {
    const child = getChild(node, side);
    return child ? treeHeight(child) + 1 : 0;
  });
  return Math.max(...heights);
}
