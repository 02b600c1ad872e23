import type { ArgsDef } from 'citty'
import { defineCommand } from 'citty'
import type { SetupConfig } from './types'
import { normalizeConfig } from './config'
import { run } from './main'

export const cliArgs = {
  'rust-toolchain': {
    type: 'string',
    description: 'Toolchain to install and make default (default: nightly)'
  },
  'rust-profile': {
    type: 'string',
    description: 'rustup profile (default: minimal)'
  },
  'enable-proxy': {
    type: 'boolean',
    description: 'Use rsproxy and a GitHub proxy for downloads'
  },
  'install-mdbook': {
    type: 'string',
    description: 'mdBook version to install'
  },
  'cache-dir': {
    type: 'string',
    description: 'Cache directory (default: .cache)'
  },
  'clear-cache': {
    type: 'boolean',
    description: 'Delete the cache directory before setup'
  },
  'execute-command': {
    type: 'string',
    description: 'Command to run after setup; the cache is written back afterwards'
  },
  'working-directory': {
    type: 'string',
    description: 'Directory relative paths are resolved against'
  }
} satisfies ArgsDef

export interface CliOptions {
  'rust-toolchain'?: string
  'rust-profile'?: string
  'enable-proxy'?: boolean
  'install-mdbook'?: string
  'cache-dir'?: string
  'clear-cache'?: boolean
  'execute-command'?: string
  'working-directory'?: string
}

const BUILTIN_FLAGS = new Set(['help', 'version', 'h', 'v'])

const STRING_FLAGS = new Set(
  Object.entries(cliArgs)
    .filter(([, def]) => def.type === 'string')
    .map(([name]) => name)
)

/**
 * Return the first argument this command does not take. Every flag value
 * follows its flag, so any other bare word (or `--`) is rejected.
 */
export function findUnknownArg(rawArgs: string[]): string | undefined {
  for (let i = 0; i < rawArgs.length; i++) {
    const raw = rawArgs[i]
    if (raw === '--' || !raw.startsWith('-')) return raw

    const [name, inline] = raw.replace(/^-{1,2}/, '').split('=', 2)
    const bare = name.startsWith('no-') ? name.slice(3) : name
    if (BUILTIN_FLAGS.has(name)) continue
    if (!Object.hasOwn(cliArgs, name) && !Object.hasOwn(cliArgs, bare)) {
      return raw
    }

    // Skip the value of `--flag value`
    const next = rawArgs[i + 1]
    if (
      STRING_FLAGS.has(name) &&
      inline === undefined &&
      next !== undefined &&
      !next.startsWith('-')
    ) {
      i++
    }
  }
  return undefined
}

/**
 * Build the setup configuration from parsed flags, falling back to the
 * SETUP_* environment variables
 */
export function configFromArgs(args: CliOptions): SetupConfig {
  const env = process.env
  return normalizeConfig({
    toolchain: args['rust-toolchain'] || env.SETUP_RUST_TOOLCHAIN,
    profile: args['rust-profile'] || env.SETUP_RUST_PROFILE,
    enableProxy: Boolean(args['enable-proxy']),
    mdbookVersion: args['install-mdbook'] ?? env.SETUP_MDBOOK,
    cacheDir: args['cache-dir'] || env.CACHE_DIR,
    clearCache: Boolean(args['clear-cache']),
    command: args['execute-command'],
    workingDirectory: args['working-directory']
  })
}

export const main = defineCommand({
  meta: {
    name: 'setup-rust-then',
    description:
      'Install a cached Rust toolchain and optional mdBook, then run a command'
  },
  args: cliArgs,
  async run({ args, rawArgs }) {
    const unknown = findUnknownArg(rawArgs)
    if (unknown) {
      throw new Error(`Unknown arg: ${unknown}`)
    }
    await run(() => configFromArgs(args))
  }
})
