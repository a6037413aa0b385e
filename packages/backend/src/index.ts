export { buildCommandEnvironment, COMMAND_LOCALE, sanitizeEnvironment } from "./environment.js";
export { CommandExecutor, type CommandExecutorOptions, formatCommand, runChecked, runTolerant } from "./executor.js";
export { type CreateBackendsOptions, createBackends, createBackendsWith, type SystemBackends } from "./factory.js";
export { collectStateDump, formatStateDump, type StateDumpSection, SystemInspector } from "./inspector.js";
export { FileSessionLock, type FileSessionLockOptions, LOCK_RETRY_MS, LOCK_STALE_MS } from "./lockfile.js";
export {
  type IptablesBackendOptions,
  IptablesMarkingBackend,
  renderChainSetup,
  renderChainTeardown,
  renderListRules,
  renderMarkRule,
  renderMatch,
} from "./iptables.js";
export { type CommandResponder, type RecordedCommand, RecordingRunner } from "./memory.js";
export {
  formatKbit,
  renderClass,
  renderClear,
  renderCurve,
  renderFilter,
  renderRoot,
  renderShow,
  type TcBackendOptions,
  type TcObject,
  TcShaperBackend,
} from "./tc.js";
export type { CommandOptions, CommandResult, CommandRunner, TerminationReason } from "./types.js";
