/**
 * Site generation options and results
 */

/**
 * What happens at a missing child:
 * - prune: no directory, no link
 * - null-page: a placeholder page holding only a Parent link
 */
export type AbsentChildPolicy = 'prune' | 'null-page';

/**
 * Where page CSS lives:
 * - shared: one styles.css at the output root, linked by depth
 * - inline: a <style> block in every page
 */
export type StylesheetMode = 'shared' | 'inline';

/** Resolved styling handed to the renderer */
export type PageStyle = { mode: 'shared' } | { mode: 'inline'; css: string };

export interface SiteOptions {
  absentChildren: AbsentChildPolicy;
  stylesheet: StylesheetMode;
  /** CSS source file; defaults to the bundled stylesheet */
  stylesheetPath?: string;
}

export const DEFAULT_SITE_OPTIONS: SiteOptions = {
  absentChildren: 'prune',
  stylesheet: 'shared',
};

export type PageKind = 'node' | 'null';

/**
 * One written page
 */
export interface GeneratedPage {
  /** Position directory holding index.html */
  dir: string;
  depth: number;
  kind: PageKind;
  /** Node value; absent on null pages */
  value?: number;
}

export interface SiteReport {
  outputRoot: string;
  /** Pages in write order (depth-first, left before right) */
  pages: GeneratedPage[];
  nodePages: number;
  nullPages: number;
  /** Shared stylesheet location; absent in inline mode */
  stylesheetPath?: string;
}
