import { describe, it, expect } from 'vitest';
import { path_basename, path_normalize, path_resolve } from './path.js';

describe('path_resolve', (): void => {
    it('joins relative input onto the working directory', (): void => {
        expect(path_resolve('docs/a.txt', '/home/user')).toBe('/home/user/docs/a.txt');
    });

    it('keeps absolute input and ignores the working directory', (): void => {
        expect(path_resolve('/etc/hosts', '/home/user')).toBe('/etc/hosts');
    });

    it('collapses dot segments', (): void => {
        expect(path_resolve('../x/./y/..', '/home/user')).toBe('/home/x');
        expect(path_resolve('../../../..', '/home/user')).toBe('/');
    });

    it('drops a trailing slash except for the root', (): void => {
        expect(path_resolve('docs/', '/srv')).toBe('/srv/docs');
        expect(path_resolve('/', '/srv')).toBe('/');
    });
});

describe('path_normalize', (): void => {
    it('merges repeated separators', (): void => {
        expect(path_normalize('/a//b///c/')).toBe('/a/b/c');
    });
});

describe('path_basename', (): void => {
    it('returns the last segment', (): void => {
        expect(path_basename('/a/b/c.txt')).toBe('c.txt');
    });
});
