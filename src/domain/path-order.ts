import path from 'node:path';

function compareStrings(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * Orders paths component by component, so `a/b` sorts before `a-b` and a
 * parent always precedes its descendants.
 */
export function comparePaths(left: string, right: string): number {
  const leftParts = left.split(path.sep);
  const rightParts = right.split(path.sep);
  const length = Math.min(leftParts.length, rightParts.length);

  for (let index = 0; index < length; index += 1) {
    const result = compareStrings(leftParts[index] ?? '', rightParts[index] ?? '');
    if (result !== 0) {
      return result;
    }
  }

  return leftParts.length - rightParts.length;
}

export function sortPaths(paths: readonly string[]): string[] {
  return [...paths].sort(comparePaths);
}
