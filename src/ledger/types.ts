/**
 * Ordered, append-mostly log of entries. Used as a list (installed packages,
 * consumed back to front) and as a stack (backup generations, only the last
 * entry matters).
 */
export interface OrderedLog {
  readonly path: string
  exists(): Promise<boolean>
  /**
   * Create the log empty if it does not exist yet.
   */
  ensure(): Promise<void>
  entries(): Promise<string[]>
  append(entry: string): Promise<void>
  peekLast(): Promise<string | undefined>
  popLast(): Promise<string | undefined>
  contains(entry: string): Promise<boolean>
  /**
   * Remove the most recent occurrence of entry. Resolves false if absent.
   */
  remove(entry: string): Promise<boolean>
  isEmpty(): Promise<boolean>
  delete(): Promise<void>
}

export function parseLedger(content: string): string[] {
  return content
    .split('\n')
    .map(line => (line.endsWith('\r') ? line.slice(0, -1) : line))
    .filter(line => line.trim().length > 0)
}

export function formatLedger(entries: readonly string[]): string {
  return entries.length ? entries.join('\n') + '\n' : ''
}

export function assertLedgerEntry(entry: string): void {
  if (!entry.trim()) throw new Error('Ledger entry must not be empty')
  if (/[\r\n]/.test(entry)) throw new Error(`Ledger entry must be a single line: ${JSON.stringify(entry)}`)
}
