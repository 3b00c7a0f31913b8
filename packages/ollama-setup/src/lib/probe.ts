import { ProbeError } from './errors.js'
import { logWarning } from './logging.js'
import { COMMAND_NOT_FOUND_EXIT_CODE } from './process.js'
import type { CommandRunner } from './types.js'

export const ACCELERATOR_QUERY_COMMAND = 'nvidia-smi'
export const ACCELERATOR_QUERY_ARGS = [
  '--query-gpu=memory.total',
  '--format=csv,noheader,nounits',
]

export type ProbeOptions = {
  /** Report a missing or failing query tool as 0 MB instead of throwing. */
  allowMissingAccelerator?: boolean
}

export function parseAcceleratorMemory(stdout: string): number {
  const firstLine = stdout
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0)

  if (firstLine == null) {
    throw new ProbeError(`${ACCELERATOR_QUERY_COMMAND} reported no GPU memory value`)
  }
  if (!/^\d+$/.test(firstLine)) {
    throw new ProbeError(
      `Unable to parse GPU memory from ${ACCELERATOR_QUERY_COMMAND} output: '${firstLine}'`
    )
  }
  return Number.parseInt(firstLine, 10)
}

export async function probeAcceleratorMemory(
  runner: CommandRunner,
  options: ProbeOptions = {}
): Promise<number> {
  const result = await runner.run(ACCELERATOR_QUERY_COMMAND, ACCELERATOR_QUERY_ARGS, {
    capture: true,
  })

  if (result.exitCode !== 0) {
    const reason =
      result.exitCode === COMMAND_NOT_FOUND_EXIT_CODE
        ? `${ACCELERATOR_QUERY_COMMAND} not found. Install the NVIDIA driver utilities.`
        : `${ACCELERATOR_QUERY_COMMAND} exited with code ${result.exitCode}: ${result.stderr.trim()}`
    if (options.allowMissingAccelerator) {
      logWarning(`${reason} Assuming 0 MB of GPU RAM.`)
      return 0
    }
    throw new ProbeError(reason, result.exitCode)
  }

  return parseAcceleratorMemory(result.stdout)
}
