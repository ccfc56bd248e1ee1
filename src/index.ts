export * from './interfaces';
export {
  Server,
  ServerGroup,
  DEFAULT_SSH_PORT,
} from './classes/server';
export type { Connection } from './classes/connection-manager';
export {
  ConnectionManager,
  DEFAULT_READY_TIMEOUT_MS,
} from './classes/connection-manager';
export {
  RemoteExecutor,
  TERMINAL,
  toExitStatus,
} from './classes/remote-executor';
export {
  RemoteFileResolver,
  buildReadCommand,
  parseReadOutput,
  redactResourceState,
  ID_SEPARATOR,
  REDACTED,
} from './classes/remote-file';
export * from './lib/errors';
export type { HostKeyPolicy, HostFingerprint } from './lib/host-key';
export {
  parseFingerprint,
  computeFingerprint,
  createHostVerifier,
} from './lib/host-key';
export { scrubSudoPassword, SUDO_PROMPT_MARKER } from './lib/scrub';
export { KeyedLock } from './lib/keyed-lock';
