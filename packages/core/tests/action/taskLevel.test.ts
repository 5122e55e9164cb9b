import { describe, it, expect } from 'vitest';
import { formatTaskLevel, parseTaskLevel, isDirectChildLevel } from '../../src/action/taskLevel.js';

describe('formatTaskLevel', () => {
    it('renders the root as a single slash', () => {
        expect(formatTaskLevel([])).toBe('/');
    });

    it('renders nested positions as a slash-delimited path', () => {
        expect(formatTaskLevel([1])).toBe('/1/');
        expect(formatTaskLevel([2, 1, 12])).toBe('/2/1/12/');
    });
});

describe('parseTaskLevel', () => {
    it('parses the root and nested paths', () => {
        expect(parseTaskLevel('/')).toEqual([]);
        expect(parseTaskLevel('/3/')).toEqual([3]);
        expect(parseTaskLevel('/2/1/12/')).toEqual([2, 1, 12]);
    });

    it.each(['', '1/', '/1', '//', '/0/', '/01/', '/a/', '/1//2/'])('rejects %j', (path) => {
        expect(parseTaskLevel(path)).toBeUndefined();
    });

    it('inverts formatTaskLevel', () => {
        const level = [4, 2, 9];
        expect(parseTaskLevel(formatTaskLevel(level))).toEqual(level);
    });
});

describe('isDirectChildLevel', () => {
    it('accepts exactly one extra trailing segment', () => {
        expect(isDirectChildLevel([], [1])).toBe(true);
        expect(isDirectChildLevel([2], [2, 5])).toBe(true);
    });

    it('rejects siblings, grandchildren and other branches', () => {
        expect(isDirectChildLevel([2], [3])).toBe(false);
        expect(isDirectChildLevel([2], [2, 1, 1])).toBe(false);
        expect(isDirectChildLevel([2], [1, 1])).toBe(false);
        expect(isDirectChildLevel([2], [2])).toBe(false);
    });
});
