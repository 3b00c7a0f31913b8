import { AuthenticationError } from '../../src/lib/errors.js'
import { formatCommandLine } from '../../src/lib/process.js'
import type { SessionManager } from '../../src/lib/sudo.js'
import type { CommandResult, CommandRunner, RunOptions } from '../../src/lib/types.js'

export type RecordedCall = {
  command: string
  args: string[]
  options: RunOptions
}

export const NVIDIA_SMI_QUERY = 'nvidia-smi --query-gpu=memory.total --format=csv,noheader,nounits'

/**
 * In-process stand-in for the system tools. Responses are matched by command
 * line prefix; the most recently registered match wins. Unmatched commands
 * succeed with empty output.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = []
  private readonly responses: Array<{ prefix: string; result: Partial<CommandResult> }> = []

  respond(prefix: string, result: Partial<CommandResult>): this {
    this.responses.push({ prefix, result })
    return this
  }

  withGpuMemory(megabytes: number): this {
    return this.respond(NVIDIA_SMI_QUERY, { stdout: `${megabytes}\n` })
  }

  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, args, options })
    const line = formatCommandLine(command, args)
    const match = [...this.responses].reverse().find((entry) => line.startsWith(entry.prefix))
    return Promise.resolve({
      exitCode: 0,
      stdout: '',
      stderr: '',
      duration: 0,
      ...match?.result,
    })
  }

  commandLines(): string[] {
    return this.calls.map((call) => formatCommandLine(call.command, call.args))
  }
}

export class RecordingSession implements SessionManager {
  readonly events: Array<'acquire' | 'keepAlive' | 'release'> = []

  constructor(private readonly failAcquire = false) {}

  acquire(): Promise<void> {
    this.events.push('acquire')
    if (this.failAcquire) {
      return Promise.reject(new AuthenticationError())
    }
    return Promise.resolve()
  }

  keepAlive(): void {
    this.events.push('keepAlive')
  }

  release(): void {
    this.events.push('release')
  }
}
