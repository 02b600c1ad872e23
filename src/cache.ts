import * as cache from '@actions/cache'
import * as core from '@actions/core'
import * as glob from '@actions/glob'
import * as io from '@actions/io'
import * as os from 'os'
import * as path from 'path'
import type {
  CacheState,
  RemoteCacheResult,
  RuntimeContext,
  SetupConfig
} from './types'
import { SetupError, withStep } from './errors'
import {
  installRustup,
  loadCargoEnv,
  runCommand,
  setDefaultToolchain,
  writeCargoConfig
} from './setup'
import { copyDirContents, getSystemInfo, isDirectory } from './utils'

export const CARGO_CACHE = 'cargo'
export const RUSTUP_CACHE = 'rustup'

export function cargoCacheDir(ctx: RuntimeContext): string {
  return path.join(ctx.cacheDir, CARGO_CACHE)
}

export function rustupCacheDir(ctx: RuntimeContext): string {
  return path.join(ctx.cacheDir, RUSTUP_CACHE)
}

/**
 * Delete the cache directory when the user asked for a clean run
 */
export async function clearCacheDir(
  config: SetupConfig,
  ctx: RuntimeContext
): Promise<void> {
  if (!config.clearCache || !isDirectory(ctx.cacheDir)) return

  core.info(`Clear cache dir: ${ctx.cacheDir}`)
  await withStep('clear cache dir', async () => io.rmRF(ctx.cacheDir))
}

export async function ensureCacheDir(ctx: RuntimeContext): Promise<void> {
  if (isDirectory(ctx.cacheDir)) return

  core.info('Create cache dir...')
  await withStep('create cache dir', async () => io.mkdirP(ctx.cacheDir))
}

/**
 * Classify the cache by which toolchain snapshots it holds
 */
export function inspectCache(ctx: RuntimeContext): CacheState {
  const hasCargo = isDirectory(cargoCacheDir(ctx))
  const hasRustup = isDirectory(rustupCacheDir(ctx))

  if (hasCargo && hasRustup) return 'warm'
  if (hasCargo || hasRustup) return 'partial'
  return 'cold'
}

/**
 * Make a working toolchain available, from the cache when it is warm
 */
export async function prepareToolchain(
  config: SetupConfig,
  ctx: RuntimeContext
): Promise<CacheState> {
  await clearCacheDir(config, ctx)
  await ensureCacheDir(ctx)

  const state = inspectCache(ctx)

  if (state === 'warm') {
    core.info('Rust cache found, restoring...')
    await restoreToolchain(ctx)
  } else {
    if (state === 'partial') {
      await discardPartialCache(ctx)
    }
    core.info(
      `Rust cache does not exist, installing (toolchain: ${config.toolchain}, profile: ${config.profile})...`
    )
    await installToolchain(config, ctx)
  }

  loadCargoEnv(ctx)
  await setDefaultToolchain(config, ctx)

  return state
}

/**
 * A cache holding only one snapshot cannot be restored; drop it and reinstall
 */
async function discardPartialCache(ctx: RuntimeContext): Promise<void> {
  const present = [cargoCacheDir(ctx), rustupCacheDir(ctx)].filter(dir =>
    isDirectory(dir)
  )
  const missing = isDirectory(cargoCacheDir(ctx)) ? RUSTUP_CACHE : CARGO_CACHE

  core.warning(
    `Rust cache is incomplete (missing ${missing}), discarding it and installing from scratch`
  )

  for (const dir of present) {
    await withStep('discard incomplete cache', async () => io.rmRF(dir))
  }
}

/**
 * Cold cache: run rustup-init, then seed the cache with the fresh install
 */
async function installToolchain(
  config: SetupConfig,
  ctx: RuntimeContext
): Promise<void> {
  await installRustup(config, ctx)

  for (const dir of [ctx.cargoHome, ctx.rustupHome]) {
    if (!isDirectory(dir)) {
      throw new SetupError('install Rust', `${dir} does not exist`)
    }
  }

  await writeCargoConfig(config, ctx)
  await saveToolchain(ctx)
}

/**
 * Warm cache: copy the snapshot into place and take ownership of it
 */
async function restoreToolchain(ctx: RuntimeContext): Promise<void> {
  await withStep('restore cargo cache', async () =>
    copyDirContents(cargoCacheDir(ctx), ctx.cargoHome)
  )
  await withStep('restore rustup cache', async () =>
    copyDirContents(rustupCacheDir(ctx), ctx.rustupHome)
  )

  if (process.platform === 'win32') return

  const { uid, gid } = os.userInfo()
  for (const dir of [ctx.cargoHome, ctx.rustupHome]) {
    await withStep(`change owner of ${dir}`, async () =>
      runCommand(ctx, 'chown', ['-R', `${uid}:${gid}`, dir])
    )
  }
}

/**
 * Copy both runtime directories into the cache
 */
export async function saveToolchain(ctx: RuntimeContext): Promise<void> {
  await withStep('cache cargo dir', async () =>
    copyDirContents(ctx.cargoHome, cargoCacheDir(ctx))
  )
  await withStep('cache rustup dir', async () =>
    copyDirContents(ctx.rustupHome, rustupCacheDir(ctx))
  )
}

/**
 * Bring the cache up to date with what the custom command changed
 */
export async function writeBackCache(ctx: RuntimeContext): Promise<void> {
  await core.group('Writing back Rust cache', async () => saveToolchain(ctx))
}

/**
 * Compute the key used for the cache directory in the Actions cache service
 */
export async function remoteCacheKey(config: SetupConfig): Promise<{
  primaryKey: string
  restoreKey: string
}> {
  const { target } = await getSystemInfo()
  const restoreKey = `${config.remoteCache.keyPrefix}-${target}-${config.toolchain}-${config.profile}`

  let primaryKey = restoreKey
  if (config.remoteCache.dependencyPath) {
    const hash = await glob.hashFiles(config.remoteCache.dependencyPath)
    if (hash) primaryKey = `${restoreKey}-${hash}`
  }

  return { primaryKey, restoreKey }
}

/**
 * Restore the cache directory from the Actions cache service
 */
export async function restoreRemoteCache(
  config: SetupConfig,
  ctx: RuntimeContext
): Promise<RemoteCacheResult | undefined> {
  if (!config.remoteCache.enabled) return undefined

  core.startGroup('Restoring cache directory')

  try {
    const { primaryKey, restoreKey } = await remoteCacheKey(config)
    if (config.clearCache) {
      core.info('Cache clear requested, not restoring')
      return { primaryKey }
    }

    core.info(`Checking cache: ${primaryKey}`)

    const restoredKey =
      primaryKey === restoreKey
        ? await cache.restoreCache([ctx.cacheDir], primaryKey)
        : await cache.restoreCache([ctx.cacheDir], primaryKey, [restoreKey])

    if (restoredKey) {
      core.info(`✓ Cache restored: ${restoredKey}`)
    } else {
      core.info('✗ Cache not found')
    }

    return { primaryKey, restoredKey }
  } catch (error) {
    core.warning(`Failed to restore cache directory: ${error}`)
    return undefined
  } finally {
    core.endGroup()
  }
}

/**
 * Save the cache directory unless it was restored under the same key
 */
export async function saveRemoteCache(
  ctx: RuntimeContext,
  result: RemoteCacheResult | undefined
): Promise<void> {
  if (!result) return

  if (result.restoredKey === result.primaryKey) {
    core.info(`Cache hit on ${result.primaryKey}, not saving`)
    return
  }

  core.startGroup('Saving cache directory')

  try {
    const cacheId = await cache.saveCache([ctx.cacheDir], result.primaryKey)
    if (cacheId !== -1) {
      core.info(`✓ Cache saved: ${result.primaryKey}`)
    } else {
      core.info(`Cache already exists: ${result.primaryKey}`)
    }
  } catch (error) {
    core.warning(`Failed to save cache directory: ${error}`)
  } finally {
    core.endGroup()
  }
}
