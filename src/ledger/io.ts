import fs from 'fs-extra'
import path from 'path'

import { OrderedLog, assertLedgerEntry, formatLedger, parseLedger } from './types.js'

/**
 * OrderedLog stored as a plain text file, one entry per line.
 * Appends go straight to the end of the file; removals rewrite it through a
 * temp file and a rename.
 */
export class FileLedger implements OrderedLog {
  readonly path: string

  constructor(ledgerPath: string) {
    this.path = path.resolve(ledgerPath)
  }

  async exists(): Promise<boolean> {
    return await fs.pathExists(this.path)
  }

  async ensure(): Promise<void> {
    await fs.ensureFile(this.path)
  }

  async entries(): Promise<string[]> {
    if (!await this.exists()) return []
    return parseLedger(await fs.readFile(this.path, 'utf8'))
  }

  async append(entry: string): Promise<void> {
    assertLedgerEntry(entry)
    await fs.ensureDir(path.dirname(this.path))
    // A hand-edited file may lack its final newline.
    const sep = await this.endsMidLine() ? '\n' : ''
    await fs.appendFile(this.path, sep + entry + '\n', 'utf8')
  }

  async peekLast(): Promise<string | undefined> {
    const entries = await this.entries()
    return entries[entries.length - 1]
  }

  async popLast(): Promise<string | undefined> {
    const entries = await this.entries()
    const last = entries.pop()
    if (last === undefined) return undefined
    await this.save(entries)
    return last
  }

  async contains(entry: string): Promise<boolean> {
    return (await this.entries()).includes(entry)
  }

  async remove(entry: string): Promise<boolean> {
    const entries = await this.entries()
    const idx = entries.lastIndexOf(entry)
    if (idx < 0) return false
    entries.splice(idx, 1)
    await this.save(entries)
    return true
  }

  async isEmpty(): Promise<boolean> {
    return (await this.entries()).length === 0
  }

  async delete(): Promise<void> {
    await fs.remove(this.path)
  }

  private async endsMidLine(): Promise<boolean> {
    if (!await this.exists()) return false
    const content = await fs.readFile(this.path, 'utf8')
    return content.length > 0 && !content.endsWith('\n')
  }

  private async save(entries: string[]): Promise<void> {
    await fs.ensureDir(path.dirname(this.path))
    const tmp = `${this.path}.tmp.${Date.now()}.${Math.random().toString(16).slice(2)}`
    await fs.writeFile(tmp, formatLedger(entries), 'utf8')
    await fs.rename(tmp, this.path)
  }
}
