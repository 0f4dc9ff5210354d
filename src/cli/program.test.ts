/**
 * Tests for CLI option plumbing
 * Validates that flags are parsed and mapped to orchestrator options
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { createProgram, toGenerationOptions } from './program.js';
import type { CliOptions } from './types.js';
import { InvalidInputError } from '../utils/errors.js';

describe('CLI option plumbing', () => {
  let capturedOptions: CliOptions | null = null;

  beforeEach(() => {
    capturedOptions = null;
  });

  async function parse(args: string[]): Promise<CliOptions | null> {
    const program = createProgram(async (options) => {
      capturedOptions = options;
    });
    await program.parseAsync(['node', 'tree-site', ...args]);
    return capturedOptions;
  }

  it('should default the output root and leave flags unset', async () => {
    const options = await parse([]);

    expect(options).toEqual({ out: 'tree_site' });
  });

  it('should parse every flag', async () => {
    const options = await parse([
      '--out',
      '/tmp/site',
      '--tree',
      'tree.json',
      '--null-pages',
      '--inline-css',
      '--stylesheet',
      'theme.css',
      '--verbose',
    ]);

    expect(options).toEqual({
      out: '/tmp/site',
      tree: 'tree.json',
      nullPages: true,
      inlineCss: true,
      stylesheet: 'theme.css',
      verbose: true,
    });
  });

  it('should map defaults to prune with a shared stylesheet', () => {
    expect(toGenerationOptions({ out: 'tree_site' })).toEqual({
      outRoot: 'tree_site',
      absentChildren: 'prune',
      stylesheet: 'shared',
      stylesheetPath: undefined,
      treeFile: undefined,
    });
  });

  it('should map flags to null pages and inline CSS', () => {
    expect(
      toGenerationOptions({ out: 'site', nullPages: true, inlineCss: true, tree: 't.json' })
    ).toEqual({
      outRoot: 'site',
      absentChildren: 'null-page',
      stylesheet: 'inline',
      stylesheetPath: undefined,
      treeFile: 't.json',
    });
  });

  it('should reject empty paths', () => {
    expect(() => toGenerationOptions({ out: '  ' })).toThrow(InvalidInputError);
    expect(() => toGenerationOptions({ out: 'site', tree: '' })).toThrow('--tree must not be empty');
  });
});
