import fs from 'fs-extra'
import path from 'path'

import { Logger, PlanStep } from '../types.js'
import { lexists, movePath } from './fs-ops.js'

/**
 * One timestamped snapshot of the files a single deployment displaced.
 * `root` mirrors the home tree: `<root>/<relative path>`.
 */
export interface BackupGeneration {
  id: string
  root: string
}

function pad(n: number, width = 2) {
  return String(n).padStart(width, '0')
}

/**
 * Sortable local timestamp: YYYYMMDDHHmmss.
 */
export function generationId(now: Date): string {
  return [
    pad(now.getFullYear(), 4),
    pad(now.getMonth() + 1),
    pad(now.getDate()),
    pad(now.getHours()),
    pad(now.getMinutes()),
    pad(now.getSeconds()),
  ].join('')
}

/**
 * Pick a generation directory under backupBase that does not exist yet.
 * Nothing is created on disk; the first backup move creates it.
 */
export async function newGeneration(backupBase: string, now: Date = new Date()): Promise<BackupGeneration> {
  const base = path.resolve(backupBase)
  const stamp = generationId(now)
  let id = stamp
  for (let n = 1; await lexists(path.join(base, id)); n++) {
    id = `${stamp}-${n}`
  }
  return { id, root: path.join(base, id) }
}

export function generationFromRoot(root: string): BackupGeneration {
  const abs = path.resolve(root)
  return { id: path.basename(abs), root: abs }
}

/**
 * Every non-directory entry under a generation, relative to its root, sorted.
 */
export async function listGenerationFiles(root: string): Promise<string[]> {
  const out: string[] = []
  async function walk(rel: string) {
    const names = await fs.readdir(path.join(root, rel))
    for (const name of names) {
      const childRel = rel ? path.join(rel, name) : name
      const st = await fs.lstat(path.join(root, childRel))
      if (st.isDirectory()) {
        await walk(childRel)
      } else {
        out.push(childRel)
      }
    }
  }
  await walk('')
  return out.sort()
}

/**
 * Move sourcePath aside to backupPath. Resolves false when there was nothing
 * to back up. Throws on any failure; callers must not overwrite sourcePath
 * after a failed backup.
 */
export async function backupItem(sourcePath: string, backupPath: string): Promise<boolean> {
  if (!await lexists(sourcePath)) return false
  await movePath(sourcePath, backupPath, { overwrite: false })
  return true
}

/**
 * Move a backed-up item back into place. Whatever is at targetPath is replaced.
 * Resolves false (with a warning) when the backup item is missing.
 */
export async function restoreItem(backupPath: string, targetPath: string, logger?: Logger): Promise<boolean> {
  if (!await lexists(backupPath)) {
    logger?.warn(`Backup item '${backupPath}' not found, skipping restore for '${targetPath}'.`)
    return false
  }
  await movePath(backupPath, targetPath, { overwrite: true })
  return true
}

/**
 * One backup step per relative path present under homeDir.
 */
export async function planBackups(entries: readonly string[], homeDir: string, generation: BackupGeneration): Promise<PlanStep[]> {
  const steps: PlanStep[] = []
  for (const rel of entries) {
    const from = path.join(homeDir, rel)
    if (!await lexists(from)) continue
    const to = path.join(generation.root, rel)
    steps.push({
      kind: 'backup',
      message: `Back up existing ${rel}`,
      paths: { from, to },
      undo: { kind: 'restore', message: `Rollback: restore ${rel}`, paths: { from: to, to: from } },
    })
  }
  return steps
}

/**
 * One restore step per file stored in the generation.
 */
export async function planRestores(generation: BackupGeneration, homeDir: string): Promise<PlanStep[]> {
  const files = await listGenerationFiles(generation.root)
  return files.map((rel): PlanStep => ({
    kind: 'restore',
    message: `Restore ${rel}`,
    paths: { from: path.join(generation.root, rel), to: path.join(homeDir, rel) },
  }))
}
