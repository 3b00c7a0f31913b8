import { $, blue, cyan, green, magenta, red, yellow } from 'kleur/colors'

import type { CommandResult } from './types.js'

const SECTION_RULE = '='.repeat(42)

let debugEnabled = false

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled
}

export function isDebugEnabled(): boolean {
  return debugEnabled
}

export function setColorEnabled(enabled: boolean): void {
  $.enabled = enabled
}

export function logInfo(message: string): void {
  console.log(`${blue('[INFO]')} ${message}`)
}

export function logSuccess(message: string): void {
  console.log(`${green('[SUCCESS]')} ${message}`)
}

export function logWarning(message: string): void {
  console.log(`${yellow('[WARNING]')} ${message}`)
}

export function logError(message: string): void {
  console.error(`${red('[ERROR]')} ${message}`)
}

export function logDebug(message: string): void {
  if (!debugEnabled) return
  console.log(`${cyan('[DEBUG]')} ${message}`)
}

export function printProgress(message: string): void {
  console.log(`${blue('[PROGRESS]')} ${message}`)
}

/**
 * Section header: a fixed-width rule, the title, then an underline as long
 * as the title, padded by blank lines.
 */
export function printSection(text: string): void {
  console.log('')
  console.log(magenta(SECTION_RULE))
  console.log(magenta(text))
  console.log(magenta('='.repeat(text.length)))
  console.log('')
}

export async function executeWithLog(
  description: string,
  commandLine: string,
  action: () => Promise<CommandResult>
): Promise<CommandResult> {
  printProgress(`Starting: ${description}`)
  logDebug(`Executing: ${commandLine}`)

  const result = await action()
  if (result.exitCode === 0) {
    logSuccess(`Completed: ${description}`)
  } else {
    logError(`Failed: ${description}`)
  }
  return result
}
