/**
 * Task levels: an action's position in its task tree, as a sequence of
 * 1-based child indexes. The root is the empty sequence, rendered `/`;
 * the second child of the first child of the root is `[1, 2]`, rendered
 * `/1/2/`.
 *
 * @module
 */

export function formatTaskLevel(level: readonly number[]): string {
    return level.length === 0 ? '/' : `/${level.join('/')}/`;
}

/**
 * Parse a rendered level back into its segments.
 *
 * @returns The segments, or `undefined` when `path` is not a well-formed level
 */
export function parseTaskLevel(path: string): number[] | undefined {
    if (path === '/') return [];
    if (!/^\/(?:[1-9]\d*\/)+$/.test(path)) return undefined;
    return path.slice(1, -1).split('/').map(Number);
}

/** True when `child` sits exactly one level below `parent`. */
export function isDirectChildLevel(parent: readonly number[], child: readonly number[]): boolean {
    return child.length === parent.length + 1
        && parent.every((segment, index) => child[index] === segment);
}
