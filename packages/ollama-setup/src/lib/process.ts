import { spawn } from 'node:child_process'
import { constants } from 'node:os'
import process from 'node:process'

import type { CommandResult, CommandRunner, RunOptions } from './types.js'

export const COMMAND_NOT_FOUND_EXIT_CODE = 127

function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (constants.signals[signal] ?? 0)
}

export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? `'${part}'` : part)).join(' ')
}

export function runCommand(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  const started = Date.now()
  const capture = options.capture ?? false
  const stdin = options.input != null ? 'pipe' : 'inherit'
  const output = capture ? 'pipe' : 'inherit'

  const child = spawn(command, args, {
    env: { ...process.env, ...options.env },
    stdio: [stdin, output, output],
    signal: options.signal,
  })

  let stdout = ''
  let stderr = ''
  child.stdout?.on('data', (chunk: Buffer) => {
    stdout += chunk.toString('utf8')
  })
  child.stderr?.on('data', (chunk: Buffer) => {
    stderr += chunk.toString('utf8')
  })

  return new Promise<CommandResult>((resolve, reject) => {
    if (options.input != null && child.stdin) {
      // EPIPE means the child stopped reading; its exit code decides the result.
      // A child that never started reports through its own error event.
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code !== 'EPIPE' && child.pid != null) reject(error)
      })
      child.stdin.end(options.input)
    }

    child.once('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        resolve({
          exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
          stdout,
          stderr: `${command}: command not found`,
          duration: Date.now() - started,
        })
        return
      }
      if (error.name === 'AbortError') {
        resolve({
          exitCode: signalExitCode('SIGTERM'),
          stdout,
          stderr,
          duration: Date.now() - started,
        })
        return
      }
      reject(error)
    })
    child.once('close', (code, signal) => {
      resolve({
        exitCode: code ?? (signal ? signalExitCode(signal) : 1),
        stdout,
        stderr,
        duration: Date.now() - started,
      })
    })
  })
}

export const defaultRunner: CommandRunner = {
  run: runCommand,
}

export async function commandExists(runner: CommandRunner, name: string): Promise<boolean> {
  const result = await runner.run('sh', ['-c', `command -v ${name}`], { capture: true })
  return result.exitCode === 0 && result.stdout.trim().length > 0
}
