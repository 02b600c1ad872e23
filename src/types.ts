export interface RemoteCacheConfig {
  enabled: boolean
  keyPrefix: string
  dependencyPath?: string
}

export interface SetupConfig {
  toolchain: string
  profile: string
  enableProxy: boolean
  mdbookVersion: string
  cacheDir: string
  clearCache: boolean
  command: string
  workingDirectory: string
  remoteCache: RemoteCacheConfig
}

export interface Endpoints {
  rustupInit: string
  githubProxy: string
  env: Record<string, string>
}

export interface RuntimeContext {
  home: string
  cargoHome: string
  rustupHome: string
  cacheDir: string
  binDir: string
  workingDirectory: string
  endpoints: Endpoints
  env: Record<string, string>
  paths: string[]
}

export type CacheState = 'cold' | 'warm' | 'partial'

export interface SystemInfo {
  platform: string
  arch: string
  target: string
  isMusl: boolean
}

export interface ToolSpec {
  name: string
  binary: string
  archiveUrl: (version: string, system: SystemInfo) => string
}

export type ToolInstallResult =
  | { status: 'disabled' }
  | { status: 'cached'; version: string }
  | { status: 'installed'; version: string }

export interface RemoteCacheResult {
  primaryKey: string
  restoredKey?: string
}
