import { describe, expect, it } from 'vitest'

import { DotfileRepo } from '../src/dotfiles/repo.js'
import { filterDotfileEntries, listDotfileEntries } from '../src/dotfiles/entries.js'
import { FakeRunner, ok } from './helpers.js'

describe('dotfile entries', () => {
  it('never includes the reserved repository files', () => {
    const tracked = ['.git', '.gitignore', '.mailmap', '.DS_Store', 'README.md', 'LICENSE', '.bashrc', '.config/nvim/init.lua']
    expect(filterDotfileEntries(tracked)).toEqual(['.bashrc', '.config/nvim/init.lua'])
  })

  it('matches reserved names against the whole tracked path', () => {
    expect(filterDotfileEntries(['docs/README.md', 'README.md.bak'])).toEqual(['docs/README.md', 'README.md.bak'])
  })

  it('lists the tracked tree of the configured branch', async () => {
    const runner = new FakeRunner(() => ok('.bashrc\0README.md\0.vimrc\0'))
    const repo = new DotfileRepo({ gitDir: '/home/u/.dotfiles', workTree: '/home/u', branch: 'main', runner })
    expect(await listDotfileEntries(repo)).toEqual(['.bashrc', '.vimrc'])
    expect(runner.commandLines()).toEqual(['git --git-dir=/home/u/.dotfiles ls-tree -r -z --name-only main'])
  })
})
