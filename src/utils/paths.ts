/**
 * Path utilities and naming policy for the generated site layout
 *
 * Every href here is relative and uses "/" regardless of platform, so a page
 * works when opened straight from disk. Filesystem paths go through `join`.
 */

import { join } from 'path';
import type { ChildSide } from '../tree/types.js';

/**
 * Canonical output layout structure
 */
export const SITE_LAYOUT = {
  /** Page file written into every position directory */
  INDEX_FILE: 'index.html',
  /** Shared stylesheet at the output root */
  STYLESHEET_FILE: 'styles.css',
  /** Default output root, relative to the working directory */
  DEFAULT_OUT_ROOT: 'tree_site',
} as const;

/**
 * Link from any non-root page to its parent's page
 */
export const PARENT_LINK = `../${SITE_LAYOUT.INDEX_FILE}`;

/**
 * Stylesheet bundled with the package. Resolves the same from src/utils and
 * dist/utils.
 */
export const BUNDLED_STYLESHEET = join(__dirname, '..', '..', 'assets', SITE_LAYOUT.STYLESHEET_FILE);

/**
 * Relative href from a page at `depth` to the stylesheet at the output root
 * @param depth - Edges between the page and the root (root = 0)
 */
export function getStylesheetHref(depth: number): string {
  return `${'../'.repeat(depth)}${SITE_LAYOUT.STYLESHEET_FILE}`;
}

/**
 * Relative href from a page to its child's page
 */
export function getChildHref(side: ChildSide): string {
  return `${side}/${SITE_LAYOUT.INDEX_FILE}`;
}

/**
 * Directory of a child position
 */
export function getChildDir(outputDir: string, side: ChildSide): string {
  return join(outputDir, side);
}

/**
 * Page file inside a position directory
 */
export function getIndexPath(outputDir: string): string {
  return join(outputDir, SITE_LAYOUT.INDEX_FILE);
}

/**
 * Shared stylesheet inside the output root
 */
export function getStylesheetPath(outputRoot: string): string {
  return join(outputRoot, SITE_LAYOUT.STYLESHEET_FILE);
}
