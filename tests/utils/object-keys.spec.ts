import { describe, expect, it } from 'vitest';
import {
  isFolderMarker,
  listPrefixFor,
  normalizePrefix,
  objectKeyFor,
  relativePathForKey,
} from '../../src/utils/object-keys.js';

describe('object key mapping', () => {
  it('normalizes prefixes and joins keys with a single slash', () => {
    expect(normalizePrefix('/site/prod/')).toBe('site/prod');
    expect(listPrefixFor('')).toBe('');
    expect(listPrefixFor('site')).toBe('site/');
    expect(objectKeyFor('site/', 'css/a.css')).toBe('site/css/a.css');
    expect(objectKeyFor('', 'index.html')).toBe('index.html');
  });

  it('recognizes folder markers', () => {
    expect(isFolderMarker('site/blog/')).toBe(true);
    expect(isFolderMarker('site/blog/index.html')).toBe(false);
  });

  it('maps a key under the prefix back to its relative path', () => {
    expect(relativePathForKey('site', 'site/blog/post/index.html', '/srv/docs')).toBe('blog/post/index.html');
    expect(relativePathForKey('', 'index.html', '/srv/docs')).toBe('index.html');
  });

  it.each([
    ['other/index.html', 'outside the snapshot prefix'],
    ['site/', 'empty path'],
    ['site/a\0b', 'contains a NUL byte'],
    ['site/..\\evil', 'contains a backslash'],
    ['site//etc/passwd', 'absolute path'],
    ['site/C:/evil.txt', 'absolute path'],
    ['site/../evil.txt', 'contains an empty, "." or ".." segment'],
    ['site/a/./b.txt', 'contains an empty, "." or ".." segment'],
    ['site/a//b.txt', 'contains an empty, "." or ".." segment'],
  ])('rejects %j (%s)', (key, reason) => {
    expect(() => relativePathForKey('site', key, '/srv/docs')).toThrowError(
      `Refusing object key ${JSON.stringify(key)}: ${reason}.`,
    );
  });

  it('rejects with the traversal_rejected code and the key as path', () => {
    let caught: unknown;
    try {
      relativePathForKey('site', 'site/../../etc/passwd', '/srv/docs');
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: 'traversal_rejected', path: 'site/../../etc/passwd' });
  });
});
