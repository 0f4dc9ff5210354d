import { Command } from 'commander';
import type { CliOptions } from './types.js';
import type { GenerationOptions } from '../core/index.js';
import { InvalidInputError } from '../utils/errors.js';
import { SITE_LAYOUT } from '../utils/paths.js';

export type CliAction = (options: CliOptions) => Promise<void>;

/**
 * Map parsed flags to orchestrator options
 */
export function toGenerationOptions(options: CliOptions): GenerationOptions {
  if (!options.out.trim()) {
    throw InvalidInputError.fromEmptyPath('--out');
  }
  if (options.tree !== undefined && !options.tree.trim()) {
    throw InvalidInputError.fromEmptyPath('--tree');
  }
  if (options.stylesheet !== undefined && !options.stylesheet.trim()) {
    throw InvalidInputError.fromEmptyPath('--stylesheet');
  }

  return {
    outRoot: options.out,
    absentChildren: options.nullPages ? 'null-page' : 'prune',
    stylesheet: options.inlineCss ? 'inline' : 'shared',
    stylesheetPath: options.stylesheet,
    treeFile: options.tree,
  };
}

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name('tree-site')
    .description('Render a binary tree as a navigable static website')
    .version('0.1.0')
    .option('--out <dir>', 'Output root directory (deleted and recreated)', SITE_LAYOUT.DEFAULT_OUT_ROOT)
    .option('--tree <file>', 'JSON tree to render (default: built-in sample tree)')
    .option('--null-pages', 'Write placeholder pages for missing children')
    .option('--inline-css', 'Embed CSS in every page instead of a shared styles.css')
    .option('--stylesheet <file>', 'CSS file to use instead of the bundled stylesheet')
    .option('--verbose', 'Enable verbose logging')
    .action(action);

  return program;
}
