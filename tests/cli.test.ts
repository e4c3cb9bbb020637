import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import fs from 'fs-extra'
import path from 'node:path'

vi.mock('../src/api/setup.js', () => ({ setup: vi.fn() }))
vi.mock('../src/api/takedown.js', () => ({ takedown: vi.fn() }))

import { setup } from '../src/api/setup.js'
import { takedown } from '../src/api/takedown.js'
import { main } from '../src/cli.js'
import { MissingToolError } from '../src/errors.js'
import { makeTmp, recordingLogger } from './helpers.js'

describe('cli', () => {
  let tmp: string
  let env: NodeJS.ProcessEnv

  beforeEach(async () => {
    tmp = await makeTmp()
    env = { XDG_CONFIG_HOME: path.join(tmp, 'config'), XDG_STATE_HOME: path.join(tmp, 'state') }
    vi.mocked(setup).mockReset()
    vi.mocked(takedown).mockReset()
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await fs.remove(tmp)
  })

  async function run(...argv: string[]) {
    const { logger, lines } = recordingLogger()
    const code = await main(argv, { logger, env, homeDir: path.join(tmp, 'home') })
    return { code, lines }
  }

  it('requires an action', async () => {
    const { code, lines } = await run()
    expect(code).toBe(1)
    expect(lines).toEqual(['error: No action specified (--setup or --takedown).'])
    expect(setup).not.toHaveBeenCalled()
  })

  it('rejects both actions at once', async () => {
    const { code, lines } = await run('--setup', '--takedown')
    expect(code).toBe(1)
    expect(lines).toEqual(['error: Choose one of --setup or --takedown, not both.'])
  })

  it('rejects unknown options', async () => {
    const { code, lines } = await run('--setup', '--yes')
    expect(code).toBe(1)
    expect(lines).toEqual(['error: Unknown option: --yes'])
    expect(setup).not.toHaveBeenCalled()
  })

  it('prints help and succeeds', async () => {
    const { code } = await run('--help')
    expect(code).toBe(0)
    expect(process.stdout.write).toHaveBeenCalledWith(expect.stringContaining('homestead --setup [--force]'))
  })

  it('--setup --force runs setup with auto-confirmation and resolved settings', async () => {
    const { code } = await run('--setup', '--force')
    expect(code).toBe(0)
    expect(setup).toHaveBeenCalledTimes(1)
    expect(takedown).not.toHaveBeenCalled()

    const opts = vi.mocked(setup).mock.calls[0][0]
    expect(opts.settings.homeDir).toBe(path.join(tmp, 'home'))
    expect(opts.settings.repoDir).toBe(path.join(tmp, 'home', '.dotfiles'))
    expect(opts.settings.auditLogPath).toBe(path.join(tmp, 'state', 'homestead', 'audit.log.jsonl'))
    expect(await opts.confirm('Proceed?')).toBe(true)
  })

  it('--takedown runs takedown', async () => {
    const { code } = await run('--takedown', '--force')
    expect(code).toBe(0)
    expect(takedown).toHaveBeenCalledTimes(1)
    expect(setup).not.toHaveBeenCalled()
  })

  it('maps a failure of the run to exit code 1', async () => {
    vi.mocked(setup).mockRejectedValue(new MissingToolError('git'))
    const { code, lines } = await run('--setup', '--force')
    expect(code).toBe(1)
    expect(lines[lines.length - 1]).toBe(`error: ${new MissingToolError('git').message}`)
  })

  it('reports an invalid config file before running anything', async () => {
    await fs.outputFile(path.join(tmp, 'config', 'homestead', 'config.json'), '{ "branch": 42 }')
    const { code, lines } = await run('--setup', '--force')
    expect(code).toBe(1)
    expect(lines[lines.length - 1]).toMatch(/^error: Invalid config file .*config\.json: branch: /)
    expect(setup).not.toHaveBeenCalled()
  })
})
