import * as core from '@actions/core'
import * as os from 'os'
import * as path from 'path'
import type { Endpoints, RuntimeContext, SetupConfig } from './types'

export const RUSTUP_INIT_URL = 'https://sh.rustup.rs'

// Mirror for China Mainland
export const PROXY_ENDPOINTS: Endpoints = {
  rustupInit: 'https://rsproxy.cn/rustup-init.sh',
  githubProxy: 'https://gh-proxy.com/',
  env: {
    RUSTUP_DIST_SERVER: 'https://rsproxy.cn',
    RUSTUP_UPDATE_ROOT: 'https://rsproxy.cn/rustup'
  }
}

/**
 * Pick download endpoints for rustup and GitHub release assets
 */
export function resolveEndpoints(enableProxy: boolean): Endpoints {
  if (enableProxy) {
    return { ...PROXY_ENDPOINTS, env: { ...PROXY_ENDPOINTS.env } }
  }
  return { rustupInit: RUSTUP_INIT_URL, githubProxy: '', env: {} }
}

/**
 * Build the runtime context shared by the cache manager and tool installer
 */
export function createRuntimeContext(config: SetupConfig): RuntimeContext {
  const home = os.homedir()
  const { CARGO_HOME, RUSTUP_HOME } = process.env
  const cacheDir = path.resolve(config.workingDirectory, config.cacheDir)
  const endpoints = resolveEndpoints(config.enableProxy)

  const env: Record<string, string> = { ...endpoints.env }

  return {
    home,
    cargoHome: CARGO_HOME || path.join(home, '.cargo'),
    rustupHome: RUSTUP_HOME || path.join(home, '.rustup'),
    cacheDir,
    binDir: path.join(cacheDir, 'bin'),
    workingDirectory: config.workingDirectory,
    endpoints,
    env,
    paths: []
  }
}

/**
 * Prepend a directory to the search path of every later subprocess
 */
export function addContextPath(ctx: RuntimeContext, dir: string): void {
  if (!ctx.paths.includes(dir)) {
    ctx.paths.unshift(dir)
  }
}

/**
 * Environment for a subprocess: the current process env plus the context
 * overlay, with verbose rustup logs when step debugging is on
 */
export function subprocessEnv(ctx: RuntimeContext): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value
  }
  Object.assign(env, ctx.env)

  // Subprocess only: RUST_LOG is never exported to the job
  if (core.isDebug() && !env.RUST_LOG) {
    env.RUST_LOG = 'debug'
  }

  if (ctx.paths.length > 0) {
    env.PATH = [...ctx.paths, env.PATH]
      .filter(Boolean)
      .join(path.delimiter)
  }

  return env
}

/**
 * Export the context to the steps that follow in the job
 */
export function exportRuntimeContext(ctx: RuntimeContext): void {
  core.startGroup('Setting env vars')

  for (const [key, value] of Object.entries(ctx.env)) {
    core.info(`Setting ${key}=${value}`)
    core.exportVariable(key, value)
  }

  // addPath prepends, so add the lowest priority directory first
  for (const dir of [...ctx.paths].reverse()) {
    core.info(`Adding ${dir} to PATH`)
    core.addPath(dir)
  }

  core.endGroup()
}

export function logDiagnostics(ctx: RuntimeContext): void {
  core.info(`RUST_LOG=${process.env.RUST_LOG ?? ''}`)
  core.info(`CURRENT_PATH=${ctx.workingDirectory}`)
  core.info(`CACHE_DIR=${ctx.cacheDir}`)
}
