import * as core from '@actions/core'
import type { SetupConfig } from './types'

export const DEFAULT_TOOLCHAIN = 'nightly'
export const DEFAULT_PROFILE = 'minimal'
export const DEFAULT_CACHE_DIR = '.cache'
export const DEFAULT_CACHE_KEY_PREFIX = 'setup-rust-then-v1'

export type ConfigInput = Partial<
  Omit<SetupConfig, 'remoteCache'> & {
    remoteCache: Partial<SetupConfig['remoteCache']>
  }
>

/**
 * Fill in defaults for anything the caller left empty
 */
export function normalizeConfig(input: ConfigInput): SetupConfig {
  return {
    toolchain: input.toolchain || DEFAULT_TOOLCHAIN,
    profile: input.profile || DEFAULT_PROFILE,
    enableProxy: input.enableProxy ?? false,
    mdbookVersion: (input.mdbookVersion ?? '').trim().replace(/^v/, ''),
    cacheDir: input.cacheDir || DEFAULT_CACHE_DIR,
    clearCache: input.clearCache ?? false,
    command: input.command ?? '',
    workingDirectory: input.workingDirectory || process.cwd(),
    remoteCache: {
      enabled: input.remoteCache?.enabled ?? false,
      keyPrefix: input.remoteCache?.keyPrefix || DEFAULT_CACHE_KEY_PREFIX,
      dependencyPath: input.remoteCache?.dependencyPath || undefined
    }
  }
}

/**
 * Parse configuration from GitHub Actions inputs
 */
export function parseConfiguration(): SetupConfig {
  return normalizeConfig({
    toolchain: core.getInput('rust-toolchain'),
    profile: core.getInput('rust-profile'),
    enableProxy: core.getBooleanInput('enable-proxy'),
    mdbookVersion: core.getInput('install-mdbook'),
    cacheDir: core.getInput('cache-dir'),
    clearCache: core.getBooleanInput('clear-cache'),
    command: core.getInput('execute-command'),
    workingDirectory: core.getInput('working-directory'),
    remoteCache: {
      enabled: core.getBooleanInput('cache'),
      keyPrefix: core.getInput('cache-key-prefix'),
      dependencyPath: core.getInput('cache-dependency-path')
    }
  })
}
