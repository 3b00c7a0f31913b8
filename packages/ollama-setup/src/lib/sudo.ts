import { constants } from 'node:os'
import process from 'node:process'

import { AuthenticationError } from './errors.js'
import { logDebug, logWarning } from './logging.js'
import type { CommandRunner } from './types.js'

export const KEEPALIVE_INTERVAL_MS = 60_000

const RELEASE_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP']

export interface SessionManager {
  acquire(): Promise<void>
  keepAlive(): void
  release(): void
}

/**
 * Elevated session backed by the sudo credential cache. `keepAlive` refreshes
 * the cache with `sudo -n true` on an unref'd interval, so the timer never
 * holds the process open on its own.
 */
export class PrivilegedSession implements SessionManager {
  private timer: NodeJS.Timeout | null = null
  private inflight: AbortController | null = null

  constructor(
    private readonly runner: CommandRunner,
    private readonly intervalMs: number = KEEPALIVE_INTERVAL_MS
  ) {}

  get active(): boolean {
    return this.timer != null
  }

  async acquire(): Promise<void> {
    const result = await this.runner.run('sudo', ['-v'])
    if (result.exitCode !== 0) {
      throw new AuthenticationError()
    }
  }

  keepAlive(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      this.renew()
    }, this.intervalMs)
    this.timer.unref()
  }

  release(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    this.inflight?.abort()
    this.inflight = null
  }

  private renew(): void {
    // Previous renewal still running (e.g. sudo waiting on a slow PAM module)
    if (this.inflight) return
    const controller = new AbortController()
    this.inflight = controller
    void this.runner
      .run('sudo', ['-n', 'true'], { capture: true, signal: controller.signal })
      .then(
        (result) => {
          if (result.exitCode !== 0) {
            logDebug(`sudo keep-alive exited with ${result.exitCode}`)
          }
        },
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error)
          logDebug(`sudo keep-alive failed: ${message}`)
        }
      )
      .finally(() => {
        if (this.inflight === controller) {
          this.inflight = null
        }
      })
  }
}

export type ScopeOptions = {
  /** Called with 128 + signal number after a termination signal. */
  exit?: (code: number) => void
}

export async function withPrivilegedSession<T>(
  session: SessionManager,
  body: () => Promise<T>,
  options: ScopeOptions = {}
): Promise<T> {
  await session.acquire()
  session.keepAlive()

  const exit = options.exit ?? ((code: number) => process.exit(code))
  const onExit = () => session.release()
  const handlers = new Map<NodeJS.Signals, () => void>()
  for (const signal of RELEASE_SIGNALS) {
    const handler = () => {
      session.release()
      logWarning(`Received ${signal}. Stopping.`)
      exit(128 + constants.signals[signal])
    }
    handlers.set(signal, handler)
    process.once(signal, handler)
  }
  process.once('exit', onExit)

  try {
    return await body()
  } finally {
    for (const [signal, handler] of handlers) {
      process.removeListener(signal, handler)
    }
    process.removeListener('exit', onExit)
    session.release()
  }
}
