import { DEFAULT_INSTALL_SCRIPT_URL } from './config.js'
import { StepFailedError } from './errors.js'
import { executeWithLog, logError, logInfo, logWarning, printSection } from './logging.js'
import { probeAcceleratorMemory } from './probe.js'
import { defaultRunner, formatCommandLine } from './process.js'
import { PrivilegedSession, withPrivilegedSession } from './sudo.js'
import type { ScopeOptions, SessionManager } from './sudo.js'
import type {
  CommandResult,
  CommandRunner,
  FailurePolicy,
  ProvisionContext,
  ProvisionReport,
  StepId,
  StepResult,
} from './types.js'

export const GPU_RAM_THRESHOLD_MB = 12288
export const RECOMMENDED_MODELS = ['llama3', 'phi3'] as const
export const SERVICE_NAME = 'ollama'
export const GPU_RAM_ENV_VAR = 'GPU_RAM_MB'

export type ProvisionOptions = {
  runner?: CommandRunner
  session?: SessionManager
  failurePolicy?: FailurePolicy
  allowMissingAccelerator?: boolean
  installScriptUrl?: string
  exit?: ScopeOptions['exit']
}

export function meetsMemoryThreshold(acceleratorMemoryMb: number): boolean {
  return acceleratorMemoryMb >= GPU_RAM_THRESHOLD_MB
}

function toStepResult(id: StepId, label: string, result: CommandResult): StepResult {
  return { id, label, exitCode: result.exitCode, ok: result.exitCode === 0 }
}

class StepSequence {
  readonly steps: StepResult[] = []

  constructor(
    private readonly runner: CommandRunner,
    private readonly context: ProvisionContext,
    private readonly policy: FailurePolicy
  ) {}

  record(step: StepResult): StepResult {
    this.steps.push(step)
    if (!step.ok && this.policy === 'abort') {
      throw new StepFailedError({ stepId: step.id, label: step.label, exitCode: step.exitCode })
    }
    return step
  }

  async command(id: StepId, label: string, command: string, args: string[]): Promise<StepResult> {
    const result = await executeWithLog(label, formatCommandLine(command, args), () =>
      this.runner.run(command, args, { env: this.context.env })
    )
    return this.record(toStepResult(id, label, result))
  }

  async vendorInstaller(url: string): Promise<StepResult> {
    const label = 'Install Ollama using official installer'
    const result = await executeWithLog(label, `curl -fsSL ${url} | sh`, async () => {
      const download = await this.runner.run('curl', ['-fsSL', url], {
        capture: true,
        env: this.context.env,
      })
      if (download.exitCode !== 0) {
        if (download.stderr.trim()) logError(download.stderr.trim())
        return download
      }
      return await this.runner.run('sh', [], { input: download.stdout, env: this.context.env })
    })
    return this.record(toStepResult('vendor-installer', label, result))
  }

  get lastFailureExitCode(): number {
    const failed = this.steps.filter((step) => !step.ok)
    return failed[failed.length - 1]?.exitCode ?? 0
  }
}

/**
 * Provision Ollama end to end inside one privileged session: probe the GPU,
 * install prerequisites and the vendor build, start the service, then pull
 * the recommended models when the GPU has enough memory.
 *
 * With the `abort` policy the first failing step throws `StepFailedError`.
 * With `continue` every step runs and the report carries the exit code of
 * the last failure.
 */
export async function runProvisioning(options: ProvisionOptions = {}): Promise<ProvisionReport> {
  const runner = options.runner ?? defaultRunner
  const session = options.session ?? new PrivilegedSession(runner)
  const policy = options.failurePolicy ?? 'abort'
  const installScriptUrl = options.installScriptUrl ?? DEFAULT_INSTALL_SCRIPT_URL

  return await withPrivilegedSession(
    session,
    async () => {
      printSection('Ollama installation')
      logInfo('Starting Ollama installation script for Ubuntu 24.04...')

      const acceleratorMemoryMb = await probeAcceleratorMemory(runner, {
        allowMissingAccelerator: options.allowMissingAccelerator,
      })
      logInfo(`Detected GPU RAM: ${acceleratorMemoryMb} MB`)

      const context: ProvisionContext = {
        acceleratorMemoryMb,
        env: { [GPU_RAM_ENV_VAR]: String(acceleratorMemoryMb) },
      }
      const sequence = new StepSequence(runner, context, policy)
      sequence.record({ id: 'session', label: 'Acquire sudo session', exitCode: 0, ok: true })
      sequence.record({ id: 'probe', label: 'Detect GPU RAM', exitCode: 0, ok: true })

      await sequence.command('apt-update', 'Update package lists', 'sudo', ['apt-get', 'update'])
      await sequence.command('apt-install', 'Install curl and required dependencies', 'sudo', [
        'apt-get',
        'install',
        '-y',
        'curl',
      ])
      await sequence.vendorInstaller(installScriptUrl)
      await sequence.command('service-start', 'Start Ollama service', 'sudo', [
        'systemctl',
        'start',
        SERVICE_NAME,
      ])
      await sequence.command('service-enable', 'Enable Ollama service', 'sudo', [
        'systemctl',
        'enable',
        SERVICE_NAME,
      ])

      const modelsPulled: string[] = []
      const skippedModels: string[] = []
      if (meetsMemoryThreshold(context.acceleratorMemoryMb)) {
        logInfo('GPU RAM is sufficient (>=12GB). Installing recommended models...')
        for (const model of RECOMMENDED_MODELS) {
          const step = await sequence.command(`model:${model}`, `Pull model ${model}`, 'ollama', [
            'pull',
            model,
          ])
          if (step.ok) modelsPulled.push(model)
        }
        if (modelsPulled.length === RECOMMENDED_MODELS.length) {
          const names = RECOMMENDED_MODELS.map((model) => `'${model}'`).join(' and ')
          logInfo(`Models ${names} have been installed.`)
        }
      } else {
        logWarning('GPU RAM is less than 12GB. Skipping installation of large models.')
        skippedModels.push(...RECOMMENDED_MODELS)
      }

      const exitCode = sequence.lastFailureExitCode
      if (exitCode === 0) {
        logInfo('Ollama installation script completed.')
      } else {
        const failed = sequence.steps.filter((step) => !step.ok).length
        logWarning(`Ollama installation script completed with ${failed} failed step(s).`)
      }

      return {
        acceleratorMemoryMb: context.acceleratorMemoryMb,
        modelsPulled,
        skippedModels,
        steps: sequence.steps,
        exitCode,
      }
    },
    { exit: options.exit }
  )
}
