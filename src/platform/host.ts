import fs from 'fs-extra'
import os from 'os'

/**
 * What the platform resolver needs to know about the machine it runs on.
 * Swapped out in tests.
 */
export interface Host {
  kernelName(): string
  isDirectory(p: string): Promise<boolean>
  readTextFile(p: string): Promise<string | undefined>
}

export const nodeHost: Host = {
  kernelName: () => os.type(),
  async isDirectory(p) {
    try {
      const st = await fs.stat(p)
      return st.isDirectory()
    } catch {
      return false
    }
  },
  async readTextFile(p) {
    if (!await fs.pathExists(p)) return undefined
    return await fs.readFile(p, 'utf8')
  },
}
