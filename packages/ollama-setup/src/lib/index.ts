export { resolvePlatformKey } from './platform.js'
export type { PlatformKey } from './platform.js'
export { configSchema, loadConfig, parseConfig, resetConfigCache } from './config.js'
export type { Config } from './config.js'
export { AuthenticationError, ProbeError, StepFailedError, exitCodeForError } from './errors.js'
export {
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
} from './logging.js'
export {
  COMMAND_NOT_FOUND_EXIT_CODE,
  commandExists,
  defaultRunner,
  formatCommandLine,
  runCommand,
} from './process.js'
export { KEEPALIVE_INTERVAL_MS, PrivilegedSession, withPrivilegedSession } from './sudo.js'
export type { ScopeOptions, SessionManager } from './sudo.js'
export { parseAcceleratorMemory, probeAcceleratorMemory } from './probe.js'
export type { ProbeOptions } from './probe.js'
export {
  GPU_RAM_ENV_VAR,
  GPU_RAM_THRESHOLD_MB,
  RECOMMENDED_MODELS,
  SERVICE_NAME,
  meetsMemoryThreshold,
  runProvisioning,
} from './provision.js'
export type { ProvisionOptions } from './provision.js'
export { confirmInstall, shouldConfirm } from './confirm.js'
export type {
  CommandResult,
  CommandRunner,
  DoctorCheck,
  FailurePolicy,
  ProbePayload,
  ProvisionContext,
  ProvisionReport,
  RunOptions,
  StepId,
  StepResult,
} from './types.js'
