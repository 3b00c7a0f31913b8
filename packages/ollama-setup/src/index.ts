#!/usr/bin/env node

import { Command } from 'commander'
import { realpathSync } from 'node:fs'
import { pathToFileURL } from 'node:url'
import process from 'node:process'

import { applyLoggingConfig, commandDoctor, commandInstall, commandProbe } from './commands.js'
import { exitCodeForError, loadConfig, logError } from './lib/index.js'

export function createProgram(): Command {
  const program = new Command()
    .name('ollama-setup')
    .description('Provision a GPU-accelerated Ollama server on Ubuntu')
    .hook('preAction', () => {
      applyLoggingConfig(loadConfig())
    })

  program
    .command('install', { isDefault: true })
    .description('Install Ollama, start its service, and pull models the GPU can hold')
    .option('--keep-going', 'Log failed steps and continue instead of aborting')
    .option('--allow-no-gpu', 'Treat a missing nvidia-smi as 0 MB of GPU RAM')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (opts: { keepGoing?: boolean; allowNoGpu?: boolean; yes?: boolean }) => {
      await commandInstall(opts)
    })

  program
    .command('probe')
    .description('Print GPU memory and whether it meets the model threshold')
    .option('--json', 'Emit JSON output')
    .option('--allow-no-gpu', 'Treat a missing nvidia-smi as 0 MB of GPU RAM')
    .action(async (opts: { json?: boolean; allowNoGpu?: boolean }) => {
      await commandProbe(opts)
    })

  program
    .command('doctor')
    .description('Check platform and required tools')
    .action(async () => {
      await commandDoctor()
    })

  return program
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv)
}

const isDirectRun = (() => {
  if (typeof process.argv[1] !== 'string') return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href
  } catch {
    return import.meta.url === pathToFileURL(process.argv[1]).href
  }
})()

if (isDirectRun) {
  runCli().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error)
    logError(message)
    process.exit(exitCodeForError(error))
  })
}
