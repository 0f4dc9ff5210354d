/**
 * Static HTML generation module
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import type { TreeNode } from '../tree/types.js';
import { InvalidInputError, SiteWriteError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { BUNDLED_STYLESHEET, getStylesheetPath } from '../utils/paths.js';
import { SiteBuilder } from './builder.js';
import type { PageStyle, SiteOptions, SiteReport } from './types.js';
import { DEFAULT_SITE_OPTIONS } from './types.js';

export { SiteBuilder } from './builder.js';
export type { SiteBuilderOptions } from './builder.js';
export { renderPage, NULL_LABEL } from './renderer.js';
export { resetOutputRoot } from './output-root.js';
export * from './types.js';

/**
 * Read the CSS source. A missing custom stylesheet is an input error.
 */
export async function loadStylesheet(path: string = BUNDLED_STYLESHEET): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Cannot read stylesheet: ${path}`, reason);
  }
}

/**
 * Generate the site for `tree` under `outputRoot`.
 *
 * The output root is created if needed but not cleared; callers wanting a
 * fresh tree run resetOutputRoot first. In shared mode styles.css is written
 * once, before any page.
 */
export async function generateSite(
  tree: TreeNode,
  outputRoot: string,
  options: SiteOptions = DEFAULT_SITE_OPTIONS
): Promise<SiteReport> {
  const logger = getLogger();
  logger.info(`Generating static site in ${outputRoot}`);
  logger.debug(
    `Absent children: ${options.absentChildren}, stylesheet: ${options.stylesheet}`
  );

  const css = await loadStylesheet(options.stylesheetPath);

  try {
    await mkdir(outputRoot, { recursive: true });
  } catch (error) {
    throw SiteWriteError.fromFsError(outputRoot, error);
  }

  let style: PageStyle;
  let stylesheetPath: string | undefined;
  if (options.stylesheet === 'shared') {
    stylesheetPath = getStylesheetPath(outputRoot);
    try {
      await writeFile(stylesheetPath, css, 'utf-8');
    } catch (error) {
      throw SiteWriteError.fromFsError(stylesheetPath, error);
    }
    style = { mode: 'shared' };
  } else {
    style = { mode: 'inline', css };
  }

  const builder = new SiteBuilder({ absentChildren: options.absentChildren, style });
  try {
    await builder.build(tree, outputRoot, undefined, 0);
  } catch (error) {
    logger.error(`Failed to generate site: ${error instanceof Error ? error.message : String(error)}`);
    throw error;
  }

  const pages = [...builder.pages];
  const nullPages = pages.filter((page) => page.kind === 'null').length;

  logger.phaseComplete('Site generation', `${pages.length} pages`);

  return {
    outputRoot,
    pages,
    nodePages: pages.length - nullPages,
    nullPages,
    stylesheetPath,
  };
}
