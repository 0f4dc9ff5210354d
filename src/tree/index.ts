/**
 * Binary tree model and suppliers
 */

export {
  type TreeNode,
  type ChildSide,
  CHILD_SIDES,
  createNode,
  getChild,
  countNodes,
  treeHeight,
} from './types.js';

export { buildExampleTree } from './sample.js';
export { parseTree, loadTree } from './loader.js';
