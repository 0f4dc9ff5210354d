/**
 * Tree supplier backed by a JSON file
 *
 * Accepted shape, recursively:
 *   { "value": 10, "left": { "value": 5 }, "right": null }
 *
 * Only structure is checked. Duplicate and negative values pass through.
 */

import { readFile } from 'fs/promises';
import { InvalidTreeError } from '../utils/errors.js';
import { CHILD_SIDES, createNode, TreeNode } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseChild(value: unknown, location: string): TreeNode | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return parseNode(value, location);
}

function parseNode(value: unknown, location: string): TreeNode {
  if (!isRecord(value)) {
    throw InvalidTreeError.fromShape(location, 'expected an object');
  }

  const nodeValue = value.value;
  if (typeof nodeValue !== 'number' || !Number.isSafeInteger(nodeValue)) {
    throw InvalidTreeError.fromShape(location, '"value" must be an integer');
  }

  const unknownKeys = Object.keys(value).filter(
    (key) => key !== 'value' && !CHILD_SIDES.some((side) => side === key)
  );
  if (unknownKeys.length > 0) {
    throw InvalidTreeError.fromShape(location, `unexpected key "${unknownKeys[0]}"`);
  }

  return createNode(
    nodeValue,
    parseChild(value.left, `${location}.left`),
    parseChild(value.right, `${location}.right`)
  );
}

/**
 * Convert parsed JSON into a tree
 */
export function parseTree(json: unknown): TreeNode {
  return parseNode(json, '$');
}

/**
 * Read and parse a tree file
 */
export async function loadTree(file: string): Promise<TreeNode> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw InvalidTreeError.fromUnreadable(file, reason);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw InvalidTreeError.fromUnparsable(file, reason);
  }

  return parseTree(parsed);
}
