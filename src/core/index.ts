import { resolve } from 'path';
import { getLogger } from '../utils/logger.js';
import { getIndexPath, SITE_LAYOUT } from '../utils/paths.js';
import { buildExampleTree, countNodes, loadTree, treeHeight } from '../tree/index.js';
import type { TreeNode } from '../tree/index.js';
import { generateSite } from '../site/index.js';
import { resetOutputRoot } from '../site/output-root.js';
import type { AbsentChildPolicy, SiteReport, StylesheetMode } from '../site/types.js';

export interface GenerationOptions {
  outRoot?: string;
  absentChildren?: AbsentChildPolicy;
  stylesheet?: StylesheetMode;
  stylesheetPath?: string;
  /** JSON tree file; the sample tree is used when absent */
  treeFile?: string;
  /** Tree supplied in memory; takes precedence over treeFile */
  tree?: TreeNode;
}

async function obtainTree(options: GenerationOptions): Promise<TreeNode> {
  if (options.tree) {
    return options.tree;
  }
  if (options.treeFile) {
    getLogger().debug(`Loading tree from ${options.treeFile}`);
    return loadTree(options.treeFile);
  }
  return buildExampleTree();
}

/**
 * Obtain the tree, clear the output root, generate every page and report
 * where the site landed.
 */
export async function orchestrateGeneration(options: GenerationOptions = {}): Promise<SiteReport> {
  const logger = getLogger();
  const outRoot = options.outRoot ?? SITE_LAYOUT.DEFAULT_OUT_ROOT;
  const stylesheet = options.stylesheet ?? 'shared';

  const tree = await obtainTree(options);

  logger.phaseStart('reset output root');
  await resetOutputRoot(outRoot);

  const report = await generateSite(tree, outRoot, {
    absentChildren: options.absentChildren ?? 'prune',
    stylesheet,
    stylesheetPath: options.stylesheetPath,
  });

  logger.summary({
    tree: { nodes: countNodes(tree), height: treeHeight(tree) },
    pages: { node: report.nodePages, null: report.nullPages },
    stylesheet,
  });
  logger.info(`Website generated in folder: ${outRoot}`);
  logger.info(`Open ${resolve(getIndexPath(outRoot))} in your browser to explore the tree`);

  return report;
}
