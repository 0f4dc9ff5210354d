/**
 * Tests for site layout paths
 */

import { posix, join } from 'path';
import {
  getStylesheetHref,
  getChildHref,
  getChildDir,
  getIndexPath,
  getStylesheetPath,
  PARENT_LINK,
  SITE_LAYOUT,
} from './paths';

describe('paths', () => {
  describe('getStylesheetHref', () => {
    it('should be the bare filename at the root', () => {
      expect(getStylesheetHref(0)).toBe('styles.css');
    });

    it('should climb one directory per level', () => {
      expect(getStylesheetHref(1)).toBe('../styles.css');
      expect(getStylesheetHref(4)).toBe('../../../../styles.css');
    });

    it('should resolve to the root stylesheet from any depth', () => {
      for (let depth = 0; depth < 8; depth++) {
        const pageDir = posix.join('/site', ...Array<string>(depth).fill('left'));
        expect(posix.resolve(pageDir, getStylesheetHref(depth))).toBe('/site/styles.css');
      }
    });
  });

  describe('child and parent links', () => {
    it('should link children by side', () => {
      expect(getChildHref('left')).toBe('left/index.html');
      expect(getChildHref('right')).toBe('right/index.html');
    });

    it('should resolve the parent link to the page one level up', () => {
      expect(posix.resolve('/site/left/right', PARENT_LINK)).toBe('/site/left/index.html');
    });
  });

  describe('filesystem paths', () => {
    it('should nest child directories under the position directory', () => {
      expect(getChildDir(join('out', 'left'), 'right')).toBe(join('out', 'left', 'right'));
    });

    it('should place index.html and styles.css in the given directory', () => {
      expect(getIndexPath('out')).toBe(join('out', SITE_LAYOUT.INDEX_FILE));
      expect(getStylesheetPath('out')).toBe(join('out', 'styles.css'));
    });
  });
});
