import type { DotfileRepo } from './repo.js'

/**
 * Tracked paths that belong to the repository itself, never to the home directory.
 */
export const RESERVED_ENTRIES: ReadonlySet<string> = new Set([
  '.git',
  '.gitignore',
  '.mailmap',
  '.DS_Store',
  'README.md',
  'LICENSE',
])

export function filterDotfileEntries(tracked: readonly string[]): string[] {
  return tracked.filter(p => !RESERVED_ENTRIES.has(p))
}

/**
 * Enumerated fresh on every call: the repository may have changed since the
 * last run.
 */
export async function listDotfileEntries(repo: DotfileRepo): Promise<string[]> {
  return filterDotfileEntries(await repo.listTracked())
}
