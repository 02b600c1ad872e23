import { describe, it, expect, vi, beforeEach } from 'vitest'
import * as core from '@actions/core'
import * as exec from '@actions/exec'
import * as io from '@actions/io'
import * as fs from 'fs'
import {
  CARGO_CONFIG,
  CARGO_CONFIG_RSPROXY,
  resolveExecutable,
  runCommand,
  installRustup,
  writeCargoConfig,
  loadCargoEnv,
  setDefaultToolchain,
  printVersions,
  runCustomCommand
} from '../src/setup'

describe('setup', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.mocked(exec.exec).mockResolvedValue(0)
    vi.mocked(fs.existsSync).mockReturnValue(false)
    vi.mocked(fs.promises.mkdtemp).mockResolvedValue(tempDir)
  })

  const tempDir = '/tmp/test-temp/rustup-init-abc123'
  const script = `${tempDir}/rustup-init.sh`

  // Only these files exist on the fake disk
  const onDisk = (...files: string[]): void => {
    vi.mocked(fs.existsSync).mockImplementation(p => files.includes(String(p)))
  }

  describe('resolveExecutable', () => {
    it('should find a command in a directory only the context knows', () => {
      onDisk('/fake/bin/rustup')
      const ctx = createMockContext({ paths: ['/fake/bin'] })

      expect(resolveExecutable(ctx, 'rustup')).toBe('/fake/bin/rustup')
    })

    it('should prefer the first context directory holding the command', () => {
      onDisk('/a/bin/cargo', '/b/bin/cargo')
      const ctx = createMockContext({ paths: ['/b/bin', '/a/bin'] })

      expect(resolveExecutable(ctx, 'cargo')).toBe('/b/bin/cargo')
    })

    it('should leave the name to the process PATH when not found', () => {
      const ctx = createMockContext({ paths: ['/fake/bin'] })

      expect(resolveExecutable(ctx, 'curl')).toBe('curl')
    })

    it('should keep a command that is already a path', () => {
      onDisk('/fake/bin/sh')
      const ctx = createMockContext({ paths: ['/fake/bin'] })

      expect(resolveExecutable(ctx, '/bin/sh')).toBe('/bin/sh')
    })
  })

  describe('runCommand', () => {
    it('should run in the working directory with the context env', async () => {
      const ctx = createMockContext({
        env: { RUSTUP_DIST_SERVER: 'https://rsproxy.cn' }
      })

      await runCommand(ctx, 'rustup', ['show'])

      expect(exec.exec).toHaveBeenCalledWith('rustup', ['show'], {
        cwd: '/work',
        env: expect.objectContaining({
          RUSTUP_DIST_SERVER: 'https://rsproxy.cn'
        })
      })
    })

    it('should run a tool found only on the context path', async () => {
      onDisk('/fake/bin/rustup')
      const ctx = createMockContext({ paths: ['/fake/bin'] })

      await runCommand(ctx, 'rustup', ['show'])

      expect(exec.exec).toHaveBeenCalledWith(
        '/fake/bin/rustup',
        ['show'],
        expect.objectContaining({
          env: expect.objectContaining({
            PATH: expect.stringMatching(/^\/fake\/bin/)
          })
        })
      )
    })
  })

  describe('installRustup', () => {
    it('should download rustup-init and run it non-interactively', async () => {
      await installRustup(createMockConfig(), createMockContext())

      expect(exec.exec).toHaveBeenNthCalledWith(
        1,
        'curl',
        [
          '--proto',
          '=https',
          '--tlsv1.2',
          '-sSf',
          'https://sh.rustup.rs',
          '-o',
          script
        ],
        expect.objectContaining({ cwd: '/work' })
      )
      expect(exec.exec).toHaveBeenNthCalledWith(
        2,
        'sh',
        [
          script,
          '--default-toolchain',
          'stable',
          '--profile',
          'minimal',
          '-y'
        ],
        expect.objectContaining({
          env: expect.objectContaining({
            CARGO_HOME: '/tmp/test-home/.cargo',
            RUSTUP_HOME: '/tmp/test-home/.rustup'
          })
        })
      )
      expect(core.endGroup).toHaveBeenCalledOnce()
    })

    it('should use a fresh temporary directory and remove it', async () => {
      await installRustup(createMockConfig(), createMockContext())

      expect(fs.promises.mkdtemp).toHaveBeenCalledWith(
        '/tmp/test-temp/rustup-init-'
      )
      expect(io.rmRF).toHaveBeenCalledWith(tempDir)
    })

    it('should fail before the group when the temporary directory fails', async () => {
      vi.mocked(fs.promises.mkdtemp).mockRejectedValueOnce(new Error('ENOSPC'))

      await expect(
        installRustup(createMockConfig(), createMockContext())
      ).rejects.toThrow('Failed to create temporary directory: ENOSPC')
      expect(exec.exec).not.toHaveBeenCalled()
      expect(core.startGroup).not.toHaveBeenCalled()
    })

    it('should download from the mirror in proxy mode', async () => {
      const ctx = createMockContext({
        endpoints: {
          rustupInit: 'https://rsproxy.cn/rustup-init.sh',
          githubProxy: 'https://gh-proxy.com/',
          env: {}
        }
      })

      await installRustup(createMockConfig({ enableProxy: true }), ctx)

      expect(vi.mocked(exec.exec).mock.calls[0][1]).toContain(
        'https://rsproxy.cn/rustup-init.sh'
      )
    })

    it('should fail with a named diagnostic when the installer fails', async () => {
      vi.mocked(exec.exec)
        .mockResolvedValueOnce(0)
        .mockRejectedValueOnce(
          new Error("The process '/bin/sh' failed with exit code 1")
        )

      await expect(
        installRustup(createMockConfig(), createMockContext())
      ).rejects.toThrow(
        "Failed to install Rust: The process '/bin/sh' failed with exit code 1"
      )
      expect(core.endGroup).toHaveBeenCalledOnce()
      expect(io.rmRF).toHaveBeenCalledWith(tempDir)
    })

    it('should not run the installer when the download fails', async () => {
      vi.mocked(exec.exec).mockRejectedValueOnce(new Error('exit code 6'))

      await expect(
        installRustup(createMockConfig(), createMockContext())
      ).rejects.toThrow('Failed to download rustup-init: exit code 6')
      expect(exec.exec).toHaveBeenCalledOnce()
      expect(io.rmRF).toHaveBeenCalledWith(tempDir)
    })
  })

  describe('writeCargoConfig', () => {
    beforeEach(() => {
      vi.mocked(fs.promises.writeFile).mockResolvedValue()
    })

    it('should enable git-fetch-with-cli', async () => {
      await writeCargoConfig(createMockConfig(), createMockContext())

      expect(fs.promises.writeFile).toHaveBeenCalledWith(
        '/tmp/test-home/.cargo/config.toml',
        '[net]\ngit-fetch-with-cli = true\n',
        { encoding: 'utf8' }
      )
    })

    it('should append the mirror registry in proxy mode', async () => {
      await writeCargoConfig(
        createMockConfig({ enableProxy: true }),
        createMockContext()
      )

      expect(fs.promises.writeFile).toHaveBeenCalledWith(
        '/tmp/test-home/.cargo/config.toml',
        CARGO_CONFIG + CARGO_CONFIG_RSPROXY,
        { encoding: 'utf8' }
      )
      expect(CARGO_CONFIG_RSPROXY).toContain(
        'registry = "sparse+https://rsproxy.cn/index/"'
      )
    })

    it('should name the step when the write fails', async () => {
      vi.mocked(fs.promises.writeFile).mockRejectedValueOnce(
        new Error('EACCES')
      )

      await expect(
        writeCargoConfig(createMockConfig(), createMockContext())
      ).rejects.toThrow('Failed to write cargo config: EACCES')
    })
  })

  describe('loadCargoEnv', () => {
    it('should put cargo bin on the path and set the homes', () => {
      const ctx = createMockContext()

      loadCargoEnv(ctx)

      expect(ctx.env).toEqual({
        CARGO_HOME: '/tmp/test-home/.cargo',
        RUSTUP_HOME: '/tmp/test-home/.rustup'
      })
      expect(ctx.paths).toEqual(['/tmp/test-home/.cargo/bin'])
    })
  })

  describe('setDefaultToolchain', () => {
    it('should run rustup default', async () => {
      await setDefaultToolchain(createMockConfig(), createMockContext())

      expect(exec.exec).toHaveBeenCalledWith(
        'rustup',
        ['default', 'stable'],
        expect.objectContaining({ cwd: '/work' })
      )
    })

    it('should run the rustup that cargo env put on the context path', async () => {
      onDisk('/tmp/test-home/.cargo/bin/rustup')
      const ctx = createMockContext()
      loadCargoEnv(ctx)

      await setDefaultToolchain(createMockConfig(), ctx)

      expect(exec.exec).toHaveBeenCalledWith(
        '/tmp/test-home/.cargo/bin/rustup',
        ['default', 'stable'],
        expect.objectContaining({ cwd: '/work' })
      )
    })

    it('should fail when rustup is unusable', async () => {
      vi.mocked(exec.exec).mockRejectedValueOnce(new Error('not found'))

      await expect(
        setDefaultToolchain(createMockConfig(), createMockContext())
      ).rejects.toThrow('Failed to set default toolchain: not found')
    })
  })

  describe('printVersions', () => {
    const versionOf = (binary: string): exec.ExecOutput => ({
      exitCode: 0,
      stdout: `${binary} 1.0.0\n`,
      stderr: ''
    })

    beforeEach(() => {
      vi.mocked(exec.getExecOutput).mockImplementation(async binary =>
        versionOf(binary)
      )
    })

    it('should print cargo and rustup versions', async () => {
      await printVersions(createMockConfig(), createMockContext())

      expect(exec.getExecOutput).toHaveBeenCalledTimes(2)
      expect(core.info).toHaveBeenCalledWith('Cargo: cargo 1.0.0')
      expect(core.info).toHaveBeenCalledWith('Rustup: rustup 1.0.0')
    })

    it('should include mdbook when it was requested', async () => {
      await printVersions(
        createMockConfig({ mdbookVersion: '0.4.40' }),
        createMockContext()
      )

      expect(exec.getExecOutput).toHaveBeenCalledTimes(3)
      expect(core.info).toHaveBeenCalledWith('mdBook: mdbook 1.0.0')
    })

    it('should query the binaries in the context path directories', async () => {
      onDisk(
        '/tmp/test-home/.cargo/bin/cargo',
        '/tmp/test-home/.cargo/bin/rustup',
        '/work/.cache/bin/mdbook'
      )
      const ctx = createMockContext({
        paths: ['/work/.cache/bin', '/tmp/test-home/.cargo/bin']
      })

      await printVersions(createMockConfig({ mdbookVersion: '0.4.40' }), ctx)

      expect(vi.mocked(exec.getExecOutput).mock.calls.map(call => call[0])).toEqual([
        '/tmp/test-home/.cargo/bin/cargo',
        '/tmp/test-home/.cargo/bin/rustup',
        '/work/.cache/bin/mdbook'
      ])
    })

    it('should fail when a version query fails', async () => {
      vi.mocked(exec.getExecOutput)
        .mockResolvedValueOnce(versionOf('cargo'))
        .mockRejectedValueOnce(new Error('exit code 127'))

      await expect(
        printVersions(createMockConfig(), createMockContext())
      ).rejects.toThrow('Failed to get rustup version: exit code 127')
    })
  })

  describe('runCustomCommand', () => {
    it('should run the command through the shell', async () => {
      await runCustomCommand(
        createMockConfig({ command: 'cargo build --release' }),
        createMockContext()
      )

      expect(exec.exec).toHaveBeenCalledWith(
        'sh',
        ['-c', 'cargo build --release'],
        expect.objectContaining({ cwd: '/work', ignoreReturnCode: true })
      )
    })

    it('should fail on a non-zero exit code', async () => {
      vi.mocked(exec.exec).mockResolvedValueOnce(2)

      await expect(
        runCustomCommand(
          createMockConfig({ command: 'cargo test' }),
          createMockContext()
        )
      ).rejects.toThrow('Failed to execute custom command: exited with code 2')
    })
  })
})
