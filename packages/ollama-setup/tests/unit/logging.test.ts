import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
  executeWithLog,
  isDebugEnabled,
  logDebug,
  logError,
  logInfo,
  logSuccess,
  logWarning,
  printProgress,
  printSection,
  setColorEnabled,
  setDebugEnabled,
} from '../../src/lib/index.js'

beforeEach(() => {
  setColorEnabled(false)
  setDebugEnabled(false)
})

afterEach(() => {
  setDebugEnabled(false)
  vi.restoreAllMocks()
})

describe('leveled log lines', () => {
  it('prefixes each level with its label', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    logInfo('Updating package lists...')
    logSuccess('Completed: Update package lists')
    logWarning('GPU RAM is less than 12GB.')
    printProgress('Starting: Update package lists')

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '[INFO] Updating package lists...',
      '[SUCCESS] Completed: Update package lists',
      '[WARNING] GPU RAM is less than 12GB.',
      '[PROGRESS] Starting: Update package lists',
    ])
  })

  it('writes errors to stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    logError('Sudo authentication failed. Exiting.')

    expect(error).toHaveBeenCalledWith('[ERROR] Sudo authentication failed. Exiting.')
    expect(log).not.toHaveBeenCalled()
  })

  it('only prints debug lines when debug is enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    logDebug('hidden')
    setDebugEnabled(true)
    logDebug('shown')

    expect(isDebugEnabled()).toBe(true)
    expect(log.mock.calls).toEqual([['[DEBUG] shown']])
  })

  it('colors labels when colors are enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    setColorEnabled(true)

    logInfo('hello')

    expect(log).toHaveBeenCalledWith('\x1b[34m[INFO]\x1b[39m hello')
  })
})

describe('printSection', () => {
  it('prints a fixed rule, the title, and an underline matching the title', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    printSection('Setup')

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '',
      '='.repeat(42),
      'Setup',
      '=====',
      '',
    ])
  })
})

describe('executeWithLog', () => {
  it('logs start and completion around a successful command', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    setDebugEnabled(true)

    const result = await executeWithLog('Start Ollama service', 'sudo systemctl start ollama', () =>
      Promise.resolve({ exitCode: 0, stdout: '', stderr: '', duration: 5 })
    )

    expect(result.exitCode).toBe(0)
    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '[PROGRESS] Starting: Start Ollama service',
      '[DEBUG] Executing: sudo systemctl start ollama',
      '[SUCCESS] Completed: Start Ollama service',
    ])
  })

  it('logs a failure line and returns the failed result', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    const result = await executeWithLog('Pull model phi3', 'ollama pull phi3', () =>
      Promise.resolve({ exitCode: 1, stdout: '', stderr: 'pull failed', duration: 5 })
    )

    expect(result.exitCode).toBe(1)
    expect(error).toHaveBeenCalledWith('[ERROR] Failed: Pull model phi3')
  })
})
