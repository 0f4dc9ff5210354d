/**
 * Page rendering for a single site position. Pure: returns the document text
 * and leaves writing to the builder.
 */

import type { TreeNode } from '../tree/types.js';
import { getChildHref, getStylesheetHref } from '../utils/paths.js';
import type { PageStyle } from './types.js';

export const NULL_LABEL = 'null';

interface NavLink {
  href: string;
  label: string;
}

function renderStyle(style: PageStyle, depth: number): string {
  if (style.mode === 'inline') {
    return `  <style>\n${style.css.trimEnd()}\n  </style>`;
  }
  return `  <link rel="stylesheet" href="${getStylesheetHref(depth)}" />`;
}

function renderNav(links: NavLink[]): string[] {
  if (links.length === 0) {
    return ['  <nav></nav>'];
  }
  return [
    '  <nav>',
    ...links.map((link) => `    <a class="circle-link" href="${link.href}">${link.label}</a>`),
    '  </nav>',
  ];
}

function renderDocument(
  title: string,
  heading: string,
  headingClass: string,
  links: NavLink[],
  style: PageStyle,
  depth: number
): string {
  const lines = [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="UTF-8" />',
    `  <title>${title}</title>`,
    renderStyle(style, depth),
    '</head>',
    '<body>',
    `  <h1 class="${headingClass}">${heading}</h1>`,
    ...renderNav(links),
    '</body>',
    '</html>',
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Render the page for one position.
 *
 * Navigation holds, in order: Left (iff a left child exists), Parent (iff
 * `parentLink` is given), Right (iff a right child exists). A null marker
 * only ever gets the Parent link.
 *
 * @param node - Tree node, or null for a placeholder page
 * @param parentLink - Relative href to the parent's page; undefined at the root
 * @param depth - Edges from the root; sets the stylesheet href
 */
export function renderPage(
  node: TreeNode | null,
  parentLink: string | undefined,
  depth: number,
  style: PageStyle
): string {
  const parent: NavLink[] = parentLink ? [{ href: parentLink, label: 'Parent' }] : [];

  if (node === null) {
    return renderDocument('Null', NULL_LABEL, 'node-value null', parent, style, depth);
  }

  const links: NavLink[] = [
    ...(node.left ? [{ href: getChildHref('left'), label: 'Left' }] : []),
    ...parent,
    ...(node.right ? [{ href: getChildHref('right'), label: 'Right' }] : []),
  ];

  return renderDocument(`Node ${node.value}`, String(node.value), 'node-value', links, style, depth);
}
