import * as core from '@actions/core'
import * as exec from '@actions/exec'
import * as io from '@actions/io'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import type { RuntimeContext, SetupConfig } from './types'
import { addContextPath, subprocessEnv } from './environment'
import { SetupError, withStep } from './errors'
import { writeFile } from './utils'

export const CARGO_CONFIG = `[net]
git-fetch-with-cli = true
`

export const CARGO_CONFIG_RSPROXY = `
# Mirror for China Mainland
[source.crates-io]
replace-with = "rsproxy-sparse"
[source.rsproxy]
registry = "https://rsproxy.cn/crates.io-index"
[source.rsproxy-sparse]
registry = "sparse+https://rsproxy.cn/index/"
[registries.rsproxy]
index = "https://rsproxy.cn/crates.io-index"
`

/**
 * Find a bare command name in the context's own path directories.
 *
 * `exec` only searches the PATH of this process, which does not see
 * directories added to the context until they are exported.
 */
export function resolveExecutable(ctx: RuntimeContext, command: string): string {
  if (path.isAbsolute(command) || command.includes(path.sep)) return command

  const names =
    process.platform === 'win32' ? [`${command}.exe`, command] : [command]
  for (const dir of ctx.paths) {
    for (const name of names) {
      const candidate = path.join(dir, name)
      if (fs.existsSync(candidate)) return candidate
    }
  }
  return command
}

/**
 * Run an external command with the context's environment overlay
 */
export async function runCommand(
  ctx: RuntimeContext,
  command: string,
  args: string[] = [],
  options: exec.ExecOptions = {}
): Promise<number> {
  return exec.exec(resolveExecutable(ctx, command), args, {
    cwd: ctx.workingDirectory,
    env: subprocessEnv(ctx),
    ...options
  })
}

/**
 * Download rustup-init and run it non-interactively
 */
export async function installRustup(
  config: SetupConfig,
  ctx: RuntimeContext
): Promise<void> {
  const tempDir = await withStep('create temporary directory', async () =>
    fs.promises.mkdtemp(path.join(os.tmpdir(), 'rustup-init-'))
  )

  core.startGroup(
    `Install Rust (toolchain: ${config.toolchain}, profile: ${config.profile})`
  )

  try {
    const script = path.join(tempDir, 'rustup-init.sh')

    await withStep('download rustup-init', async () =>
      runCommand(ctx, 'curl', [
        '--proto',
        '=https',
        '--tlsv1.2',
        '-sSf',
        ctx.endpoints.rustupInit,
        '-o',
        script
      ])
    )

    await withStep('install Rust', async () =>
      runCommand(
        ctx,
        'sh',
        [
          script,
          '--default-toolchain',
          config.toolchain,
          '--profile',
          config.profile,
          '-y'
        ],
        {
          env: {
            ...subprocessEnv(ctx),
            CARGO_HOME: ctx.cargoHome,
            RUSTUP_HOME: ctx.rustupHome
          }
        }
      )
    )
  } finally {
    await io.rmRF(tempDir)
    core.endGroup()
  }
}

/**
 * Write cargo's client configuration, with the mirror registry in proxy mode
 */
export async function writeCargoConfig(
  config: SetupConfig,
  ctx: RuntimeContext
): Promise<void> {
  const body = config.enableProxy
    ? CARGO_CONFIG + CARGO_CONFIG_RSPROXY
    : CARGO_CONFIG

  await withStep('write cargo config', async () =>
    writeFile(path.join(ctx.cargoHome, 'config.toml'), body)
  )
}

/**
 * Equivalent of sourcing `$CARGO_HOME/env` for the context
 */
export function loadCargoEnv(ctx: RuntimeContext): void {
  ctx.env.CARGO_HOME = ctx.cargoHome
  ctx.env.RUSTUP_HOME = ctx.rustupHome
  addContextPath(ctx, path.join(ctx.cargoHome, 'bin'))
}

export async function setDefaultToolchain(
  config: SetupConfig,
  ctx: RuntimeContext
): Promise<void> {
  await withStep('set default toolchain', async () =>
    runCommand(ctx, 'rustup', ['default', config.toolchain])
  )
}

/**
 * Print the versions of the installed tools, failing if any is unusable
 */
export async function printVersions(
  config: SetupConfig,
  ctx: RuntimeContext
): Promise<void> {
  const queries: [string, string][] = [
    ['Cargo', 'cargo'],
    ['Rustup', 'rustup']
  ]
  if (config.mdbookVersion) {
    queries.push(['mdBook', 'mdbook'])
  }

  await core.group('Versions', async () => {
    for (const [label, binary] of queries) {
      const { stdout } = await withStep(`get ${binary} version`, async () =>
        exec.getExecOutput(resolveExecutable(ctx, binary), ['--version'], {
          cwd: ctx.workingDirectory,
          env: subprocessEnv(ctx),
          silent: true
        })
      )
      core.info(`${label}: ${stdout.trim()}`)
    }
  })
}

/**
 * Run the user's command through the shell
 */
export async function runCustomCommand(
  config: SetupConfig,
  ctx: RuntimeContext
): Promise<void> {
  await core.group(`Running ${config.command}`, async () => {
    const exitCode = await runCommand(ctx, 'sh', ['-c', config.command], {
      ignoreReturnCode: true
    })
    if (exitCode !== 0) {
      throw new SetupError(
        'execute custom command',
        `exited with code ${exitCode}`
      )
    }
  })
}
