import type { StepId } from './types.js'

export class AuthenticationError extends Error {
  readonly exitCode = 1 as const

  constructor(message = 'Sudo authentication failed. Exiting.') {
    super(message)
    this.name = 'AuthenticationError'
  }
}

/**
 * The accelerator query tool is missing, exited non-zero, or printed
 * something that is not an integer megabyte count.
 */
export class ProbeError extends Error {
  readonly exitCode?: number

  constructor(message: string, exitCode?: number) {
    super(message)
    this.name = 'ProbeError'
    this.exitCode = exitCode
  }
}

export class StepFailedError extends Error {
  readonly stepId: StepId
  readonly exitCode: number

  constructor(params: { stepId: StepId; label: string; exitCode: number }) {
    super(`Step '${params.label}' failed with exit code ${params.exitCode}`)
    this.name = 'StepFailedError'
    this.stepId = params.stepId
    this.exitCode = params.exitCode
  }
}

export function exitCodeForError(error: unknown): number {
  if (error instanceof AuthenticationError) return error.exitCode
  if (error instanceof StepFailedError) return error.exitCode > 0 ? error.exitCode : 1
  return 1
}
