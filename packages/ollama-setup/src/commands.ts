import process from 'node:process'

import { loadConfig } from './lib/config.js'
import type { Config } from './lib/config.js'
import { confirmInstall, shouldConfirm } from './lib/confirm.js'
import {
  GPU_RAM_THRESHOLD_MB,
  RECOMMENDED_MODELS,
  commandExists,
  defaultRunner,
  meetsMemoryThreshold,
  probeAcceleratorMemory,
  resolvePlatformKey,
  runProvisioning,
  setColorEnabled,
  setDebugEnabled,
} from './lib/index.js'
import type { CommandRunner, DoctorCheck, ProbePayload, SessionManager } from './lib/index.js'

export type CommandDeps = {
  runner?: CommandRunner
  session?: SessionManager
  config?: Config
  isTTY?: boolean
  platform?: NodeJS.Platform
  arch?: string
}

const REQUIRED_TOOLS = ['sudo', 'apt-get', 'curl', 'systemctl', 'nvidia-smi', 'ollama']

export function applyLoggingConfig(config: Config): void {
  setDebugEnabled(config.OLLAMA_SETUP_DEBUG)
  if (config.NO_COLOR != null) {
    setColorEnabled(false)
  }
}

export async function commandInstall(
  options: { keepGoing?: boolean; allowNoGpu?: boolean; yes?: boolean },
  deps: CommandDeps = {}
): Promise<void> {
  const config = deps.config ?? loadConfig()
  resolvePlatformKey(deps.platform, deps.arch)

  const isTTY = deps.isTTY ?? Boolean(process.stdout.isTTY)
  if (shouldConfirm(options.yes ?? false, isTTY)) {
    const proceed = await confirmInstall()
    if (!proceed) {
      process.exitCode = 0
      return
    }
  }

  const report = await runProvisioning({
    runner: deps.runner,
    session: deps.session,
    failurePolicy: options.keepGoing ? 'continue' : 'abort',
    allowMissingAccelerator: options.allowNoGpu ?? false,
    installScriptUrl: config.OLLAMA_INSTALL_SCRIPT_URL,
  })
  if (report.exitCode !== 0) {
    process.exitCode = report.exitCode
  }
}

export async function commandProbe(
  options: { json?: boolean; allowNoGpu?: boolean },
  deps: CommandDeps = {}
): Promise<void> {
  const acceleratorMemoryMb = await probeAcceleratorMemory(deps.runner ?? defaultRunner, {
    allowMissingAccelerator: options.allowNoGpu ?? false,
  })
  const payload: ProbePayload = {
    acceleratorMemoryMb,
    meetsThreshold: meetsMemoryThreshold(acceleratorMemoryMb),
    thresholdMb: GPU_RAM_THRESHOLD_MB,
  }
  if (options.json) {
    console.log(JSON.stringify(payload, null, 2))
    return
  }
  console.log(`GPU RAM: ${payload.acceleratorMemoryMb} MB`)
  console.log(
    `recommended models (${RECOMMENDED_MODELS.join(', ')}): ${payload.meetsThreshold ? 'yes' : 'no'} (needs >= ${payload.thresholdMb} MB)`
  )
}

export async function commandDoctor(deps: CommandDeps = {}): Promise<void> {
  const runner = deps.runner ?? defaultRunner
  const platform = deps.platform ?? process.platform
  const arch = deps.arch ?? process.arch
  const checks: DoctorCheck[] = [
    {
      name: 'platform support',
      ok: (() => {
        try {
          resolvePlatformKey(platform, arch)
          return true
        } catch {
          return false
        }
      })(),
      detail: `${platform}/${arch}`,
    },
  ]

  for (const tool of REQUIRED_TOOLS) {
    const found = await commandExists(runner, tool)
    checks.push({
      name: tool,
      ok: found,
      detail: found ? 'found on PATH' : tool === 'ollama' ? 'missing (run install)' : 'missing',
    })
  }

  let failures = 0
  for (const check of checks) {
    console.log(`${check.ok ? 'ok ' : 'bad'} ${check.name}: ${check.detail}`)
    if (!check.ok) failures += 1
  }
  if (failures > 0) {
    process.exitCode = 1
  }
}
