export type CommandResult = {
  exitCode: number
  stdout: string
  stderr: string
  duration: number
}

export type RunOptions = {
  /** Collect stdout/stderr instead of inheriting the terminal. */
  capture?: boolean
  /** Written to the child's stdin, which is then closed. */
  input?: string
  env?: Record<string, string>
  /** Aborting kills the child. */
  signal?: AbortSignal
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>
}

export type FailurePolicy = 'abort' | 'continue'

export type StepId =
  | 'session'
  | 'probe'
  | 'apt-update'
  | 'apt-install'
  | 'vendor-installer'
  | 'service-start'
  | 'service-enable'
  | `model:${string}`

export type StepResult = {
  id: StepId
  label: string
  exitCode: number
  ok: boolean
}

export type ProvisionContext = {
  acceleratorMemoryMb: number
  env: Record<string, string>
}

export type ProvisionReport = {
  acceleratorMemoryMb: number
  modelsPulled: string[]
  skippedModels: string[]
  steps: StepResult[]
  exitCode: number
}

export type ProbePayload = {
  acceleratorMemoryMb: number
  meetsThreshold: boolean
  thresholdMb: number
}

export type DoctorCheck = {
  name: string
  ok: boolean
  detail: string
}
