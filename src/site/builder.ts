import { mkdir, writeFile } from 'fs/promises';
import type { TreeNode } from '../tree/types.js';
import { CHILD_SIDES, getChild } from '../tree/types.js';
import { SiteWriteError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { getChildDir, getIndexPath, PARENT_LINK } from '../utils/paths.js';
import { renderPage } from './renderer.js';
import type { AbsentChildPolicy, GeneratedPage, PageStyle } from './types.js';

export interface SiteBuilderOptions {
  absentChildren: AbsentChildPolicy;
  style: PageStyle;
}

/**
 * Materializes a tree as nested position directories, one index.html each.
 *
 * Traversal is depth-first and sequential: a left subtree is fully written
 * before its right sibling is started. Recursion depth equals tree height.
 */
export class SiteBuilder {
  private readonly options: SiteBuilderOptions;
  private readonly written: GeneratedPage[] = [];

  constructor(options: SiteBuilderOptions) {
    this.options = options;
  }

  /**
   * Pages written so far, in write order
   */
  get pages(): readonly GeneratedPage[] {
    return this.written;
  }

  /**
   * Write the page for one position and descend into its children.
   *
   * `node` is null only for a missing child under the null-page policy.
   * Any filesystem failure rejects with SiteWriteError and stops the walk;
   * pages already written stay on disk.
   */
  async build(
    node: TreeNode | null,
    outputDir: string,
    parentLink: string | undefined,
    depth: number
  ): Promise<void> {
    await this.ensureDir(outputDir);

    if (node === null) {
      await this.writePage(outputDir, renderPage(null, parentLink, depth, this.options.style));
      this.written.push({ dir: outputDir, depth, kind: 'null' });
      return;
    }

    await this.writePage(outputDir, renderPage(node, parentLink, depth, this.options.style));
    this.written.push({ dir: outputDir, depth, kind: 'node', value: node.value });

    for (const side of CHILD_SIDES) {
      const child = getChild(node, side);
      if (!child && this.options.absentChildren === 'prune') {
        continue;
      }
      await this.build(child ?? null, getChildDir(outputDir, side), PARENT_LINK, depth + 1);
    }
  }

  private async ensureDir(dir: string): Promise<void> {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw SiteWriteError.fromFsError(dir, error);
    }
  }

  private async writePage(dir: string, html: string): Promise<void> {
    const file = getIndexPath(dir);
    try {
      await writeFile(file, html, 'utf-8');
    } catch (error) {
      throw SiteWriteError.fromFsError(file, error);
    }
    getLogger().debug(`Wrote ${file}`);
  }
}
