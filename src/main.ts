import * as core from '@actions/core'
import type { CacheState, SetupConfig, ToolInstallResult } from './types'
import { parseConfiguration } from './config'
import {
  createRuntimeContext,
  exportRuntimeContext,
  logDiagnostics
} from './environment'
import {
  prepareToolchain,
  restoreRemoteCache,
  saveRemoteCache,
  writeBackCache
} from './cache'
import { printVersions, runCustomCommand } from './setup'
import { installVersionedTool, MDBOOK } from './tools'

/**
 * Main entry point for the action and the CLI
 */
export async function run(
  configure: () => SetupConfig = parseConfiguration
): Promise<void> {
  try {
    const config = configure()
    const ctx = createRuntimeContext(config)

    logDiagnostics(ctx)

    const remote = await restoreRemoteCache(config, ctx)

    const cacheState = await prepareToolchain(config, ctx)
    const mdbook = await installVersionedTool(
      MDBOOK,
      config.mdbookVersion,
      ctx
    )

    await printVersions(config, ctx)
    exportRuntimeContext(ctx)

    if (config.command) {
      await runCustomCommand(config, ctx)
      await writeBackCache(ctx)
    }

    await saveRemoteCache(ctx, remote)

    setOutputs(config, cacheState, mdbook)
    logExecutionSummary(config, cacheState, mdbook)
  } catch (err) {
    if (err instanceof Error) {
      core.setFailed(err.message)
    } else {
      throw err
    }
  }
}

function setOutputs(
  config: SetupConfig,
  cacheState: CacheState,
  mdbook: ToolInstallResult
): void {
  core.setOutput('cache-hit', cacheState === 'warm')
  core.setOutput('cache-state', cacheState)
  core.setOutput('rust-toolchain', config.toolchain)
  core.setOutput('mdbook-cache-hit', mdbook.status === 'cached')
}

function logExecutionSummary(
  config: SetupConfig,
  cacheState: CacheState,
  mdbook: ToolInstallResult
): void {
  core.info('\nSetup summary:')
  core.info(
    `  Rust ${config.toolchain} (${config.profile}): ${cacheState === 'warm' ? 'restored from cache' : 'installed'}`
  )
  if (mdbook.status !== 'disabled') {
    core.info(
      `  mdBook v${mdbook.version}: ${mdbook.status === 'cached' ? 'restored from cache' : 'installed'}`
    )
  }
  if (config.command) {
    core.info('  Custom command: done, cache written back')
  }
}
