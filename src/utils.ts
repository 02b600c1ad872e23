import * as core from '@actions/core'
import * as exec from '@actions/exec'
import * as io from '@actions/io'
import * as fs from 'fs'
import type { SystemInfo } from './types'

const ARCHES: Record<string, string> = {
  x64: 'x86_64',
  arm64: 'aarch64'
}

/**
 * Get the Rust target triple of the runner, used to pick release assets
 */
export async function getSystemInfo(): Promise<SystemInfo> {
  const { arch } = process
  const cpu = ARCHES[arch]
  if (!cpu) {
    throw new Error(`Unsupported architecture ${arch}`)
  }

  const isMusl = process.platform === 'linux' && (await checkIsMusl())

  let target: string
  switch (process.platform) {
    case 'darwin':
      target = `${cpu}-apple-darwin`
      break
    case 'win32':
      target = `${cpu}-pc-windows-msvc`
      break
    case 'linux':
      target = `${cpu}-unknown-linux-${isMusl ? 'musl' : 'gnu'}`
      break
    default:
      throw new Error(`Unsupported platform ${process.platform}`)
  }

  return {
    platform: process.platform,
    arch,
    target,
    isMusl
  }
}

/**
 * Check if system uses musl libc
 */
async function checkIsMusl(): Promise<boolean> {
  try {
    // `ldd --version` always returns 1 and print to stderr
    const { stderr } = await exec.getExecOutput('ldd', ['--version'], {
      failOnStdErr: false,
      ignoreReturnCode: true,
      silent: true
    })
    return stderr.indexOf('musl') > -1
  } catch {
    return false
  }
}

/**
 * Write content to a file with logging
 */
export async function writeFile(
  filePath: fs.PathLike,
  body: string
): Promise<void> {
  return core.group(`Writing ${filePath}`, async () => {
    core.info(`Body:\n${body}`)
    await fs.promises.writeFile(filePath, body, { encoding: 'utf8' })
  })
}

/**
 * Copy the contents of one directory into another, merging with what is there
 */
export async function copyDirContents(
  source: string,
  dest: string
): Promise<void> {
  core.debug(`Copying ${source}/* to ${dest}`)
  await io.mkdirP(dest)
  await io.cp(source, dest, {
    recursive: true,
    force: true,
    copySourceDirectory: false
  })
}

export function isDirectory(dirPath: string): boolean {
  return fs.existsSync(dirPath) && fs.statSync(dirPath).isDirectory()
}
