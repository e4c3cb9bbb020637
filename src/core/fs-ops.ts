import fs from 'fs-extra'
import path from 'path'

export async function ensureParentDir(p: string) {
  await fs.ensureDir(path.dirname(p))
}

export async function removePath(p: string) {
  await fs.remove(p)
}

/**
 * Like pathExists, but a dangling symlink counts as present.
 */
export async function lexists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p)
    return true
  } catch (e) {
    if (isErrnoException(e) && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) return false
    throw e
  }
}

/**
 * Move a file or directory, creating the destination's parent. Works across
 * devices (fs-extra falls back to copy + remove).
 */
export async function movePath(from: string, to: string, opts: { overwrite: boolean }) {
  await ensureParentDir(to)
  await fs.move(from, to, { overwrite: opts.overwrite })
}

export async function isEmptyDir(p: string): Promise<boolean> {
  const entries = await fs.readdir(p)
  return entries.length === 0
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e
}
