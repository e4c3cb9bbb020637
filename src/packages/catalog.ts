export interface PackageSpec {
  name: string
  category: string
}

export interface PackageGroup {
  category: string
  label: string
  packages: PackageSpec[]
}

function group(category: string, label: string, names: string[]): PackageGroup {
  return { category, label, packages: names.map(name => ({ name, category })) }
}

/**
 * Install order: core tools, editor, terminal multiplexer, language runtimes.
 */
export function defaultPackageGroups(): PackageGroup[] {
  return [
    // build-essential is the Debian/Ubuntu name for gcc, make and friends.
    group('core', 'Core System Tools', ['git', 'curl', 'wget', 'unzip', 'build-essential']),
    group('editor', 'Neovim Tools', ['neovim', 'ripgrep', 'fd-find']),
    group('shell-multiplexer', 'Tmux', ['tmux']),
    group('python', 'Python', ['python3', 'python3-pip']),
    group('nodejs', 'Node.js', ['nodejs', 'npm']),
    group('go', 'Go', ['golang']),
  ]
}
