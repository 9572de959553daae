/**
 * Stable branch naming — `YY.NUMBER`, e.g. `21.3` or `22.11`.
 *
 * Branches are ordered by the numeric `(year, number)` pair, so `21.10`
 * comes after `21.9`.
 */

const STABLE_NAME = /^(\d{2})\.(\d+)$/;

export type StableVersion = {
  year: number;
  number: number;
};

/** Parse a branch name, or return null when it is not a stable branch. */
export function parseStableName(name: string): StableVersion | null {
  const m = STABLE_NAME.exec(name);
  if (!m) return null;
  return { year: Number(m[1]), number: Number(m[2]) };
}

export function isStableName(name: string): boolean {
  return parseStableName(name) !== null;
}

export function compareStable(a: StableVersion, b: StableVersion): number {
  return a.year - b.year || a.number - b.number;
}

/** Sort ascending by `(year, number)` without mutating the input. */
export function sortStables<T extends StableVersion>(stables: readonly T[]): T[] {
  return [...stables].sort(compareStable);
}

/**
 * Keep the `count` most recent entries of an ascending list.
 * Fewer entries than requested is not an error: all of them are kept.
 */
export function lastStables<T>(stables: readonly T[], count: number): T[] {
  if (count <= 0) return [];
  return stables.slice(-count);
}
