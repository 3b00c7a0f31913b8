import process from 'node:process'

export type PlatformKey = 'linux-x64' | 'linux-arm64'

export function resolvePlatformKey(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): PlatformKey {
  if (platform === 'linux' && arch === 'x64') return 'linux-x64'
  if (platform === 'linux' && arch === 'arm64') return 'linux-arm64'
  throw new Error(
    `Unsupported platform/arch: ${platform}/${arch}. Supported: Linux with apt and systemd (x64, arm64).`
  )
}
