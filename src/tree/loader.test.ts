/**
 * Tests for the JSON tree supplier
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadTree, parseTree } from './loader.js';
import { InvalidTreeError } from '../utils/errors.js';

describe('parseTree', () => {
  it('should build nested nodes and treat null children as absent', () => {
    const tree = parseTree({
      value: 10,
      left: { value: 5, left: null, right: { value: 7 } },
      right: null,
    });

    expect(tree.value).toBe(10);
    expect(tree.left?.value).toBe(5);
    expect(tree.left?.left).toBeUndefined();
    expect(tree.left?.right?.value).toBe(7);
    expect(tree.right).toBeUndefined();
  });

  it('should accept duplicate and negative values', () => {
    const tree = parseTree({ value: -4, left: { value: -4 }, right: { value: -4 } });

    expect([tree.value, tree.left?.value, tree.right?.value]).toEqual([-4, -4, -4]);
  });

  it('should reject a non-integer value with its location', () => {
    expect(() => parseTree({ value: 1, left: { value: 2.5 } })).toThrow(
      'Invalid tree node at $.left: "value" must be an integer'
    );
  });

  it('should reject a missing value', () => {
    expect(() => parseTree({ left: { value: 1 } })).toThrow(InvalidTreeError);
  });

  it('should reject a child that is not an object', () => {
    expect(() => parseTree({ value: 1, right: { value: 2, left: 3 } })).toThrow(
      'Invalid tree node at $.right.left: expected an object'
    );
  });

  it('should reject arrays and unknown keys', () => {
    expect(() => parseTree([1, 2])).toThrow('Invalid tree node at $: expected an object');
    expect(() => parseTree({ value: 1, middle: { value: 2 } })).toThrow(
      'Invalid tree node at $: unexpected key "middle"'
    );
  });
});

describe('loadTree', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'tree-site-loader-'));
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should read a tree from disk', async () => {
    const file = join(testDir, 'tree.json');
    await writeFile(file, JSON.stringify({ value: 3, right: { value: 4 } }));

    const tree = await loadTree(file);

    expect(tree.value).toBe(3);
    expect(tree.right?.value).toBe(4);
  });

  it('should reject invalid JSON', async () => {
    const file = join(testDir, 'broken.json');
    await writeFile(file, '{ "value": ');

    await expect(loadTree(file)).rejects.toThrow(`Tree file is not valid JSON: ${file}`);
  });

  it('should reject a missing file', async () => {
    const file = join(testDir, 'missing.json');

    await expect(loadTree(file)).rejects.toThrow(`Cannot read tree file: ${file}`);
  });
});
