import * as core from '@actions/core'
import * as io from '@actions/io'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import type {
  RuntimeContext,
  SystemInfo,
  ToolInstallResult,
  ToolSpec
} from './types'
import { addContextPath } from './environment'
import { withStep } from './errors'
import { runCommand } from './setup'
import { getSystemInfo, isDirectory } from './utils'

export const MDBOOK: ToolSpec = {
  name: 'mdbook',
  binary: 'mdbook',
  archiveUrl: (version: string, system: SystemInfo) => {
    const ext = system.platform === 'win32' ? 'zip' : 'tar.gz'
    // Only a static musl build is published for Linux aarch64
    const target =
      system.target === 'aarch64-unknown-linux-gnu'
        ? 'aarch64-unknown-linux-musl'
        : system.target
    return `https://github.com/rust-lang/mdBook/releases/download/v${version}/mdbook-v${version}-${target}.${ext}`
  }
}

function binaryName(spec: ToolSpec): string {
  return process.platform === 'win32' ? `${spec.binary}.exe` : spec.binary
}

export function binaryPath(binDir: string, spec: ToolSpec): string {
  return path.join(binDir, binaryName(spec))
}

export function markerPath(binDir: string, spec: ToolSpec): string {
  return path.join(binDir, `${spec.name}-cache-version`)
}

export async function ensureBinDir(ctx: RuntimeContext): Promise<void> {
  if (isDirectory(ctx.binDir)) return
  await withStep('create bin dir', async () => io.mkdirP(ctx.binDir))
}

/**
 * Read the version a cached binary was installed from
 */
export async function readVersionMarker(
  binDir: string,
  spec: ToolSpec
): Promise<string | undefined> {
  const marker = markerPath(binDir, spec)
  if (!fs.existsSync(marker)) return undefined

  const content = await withStep(`read ${spec.name} version`, async () =>
    fs.promises.readFile(marker, 'utf8')
  )
  return content.trimEnd()
}

/**
 * A tool is cached only when its binary and a marker for the same version exist
 */
export async function isToolCached(
  binDir: string,
  spec: ToolSpec,
  version: string
): Promise<boolean> {
  if (!fs.existsSync(binaryPath(binDir, spec))) return false
  return (await readVersionMarker(binDir, spec)) === version
}

/**
 * Install a release binary into the cache's bin directory unless the
 * requested version is already there
 */
export async function installVersionedTool(
  spec: ToolSpec,
  version: string,
  ctx: RuntimeContext
): Promise<ToolInstallResult> {
  await ensureBinDir(ctx)
  addContextPath(ctx, ctx.binDir)

  if (!version) return { status: 'disabled' }

  if (await isToolCached(ctx.binDir, spec, version)) {
    core.info(`Using cached ${spec.name}`)
    return { status: 'cached', version }
  }

  await core.group(`Installing ${spec.name} v${version}...`, async () => {
    const tempDir = await withStep('create temporary directory', async () =>
      fs.promises.mkdtemp(path.join(os.tmpdir(), `${spec.name}-`))
    )

    try {
      await downloadAndInstall(spec, version, ctx, tempDir)
    } finally {
      await io.rmRF(tempDir)
    }

    // Only after every install step has succeeded
    await withStep(`record ${spec.name} version`, async () =>
      fs.promises.writeFile(markerPath(ctx.binDir, spec), `${version}\n`, {
        encoding: 'utf8'
      })
    )

    core.info(`${spec.name} is installed`)
  })

  return { status: 'installed', version }
}

async function downloadAndInstall(
  spec: ToolSpec,
  version: string,
  ctx: RuntimeContext,
  tempDir: string
): Promise<void> {
  const system = await getSystemInfo()
  const url = `${ctx.endpoints.githubProxy}${spec.archiveUrl(version, system)}`
  const archive = path.join(tempDir, path.basename(new URL(url).pathname))
  const target = binaryPath(ctx.binDir, spec)

  core.info(`Downloading ${spec.name} from: ${url}`)
  await withStep(`download ${spec.name}`, async () =>
    runCommand(ctx, 'curl', ['-L', '-f', url, '-o', archive])
  )

  core.info(`Extracting ${spec.name}...`)
  await withStep(`extract ${spec.name}`, async () =>
    archive.endsWith('.zip')
      ? runCommand(ctx, 'unzip', ['-o', archive, '-d', tempDir])
      : runCommand(ctx, 'tar', ['-xzf', archive, '-C', tempDir])
  )

  await withStep(`move ${spec.name} binary`, async () =>
    io.mv(path.join(tempDir, binaryName(spec)), target, { force: true })
  )

  if (process.platform !== 'win32') {
    await withStep(`make ${spec.name} executable`, async () =>
      runCommand(ctx, 'chmod', ['+x', target])
    )
  }
}
