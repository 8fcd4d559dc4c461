export { loadConfig, resetConfig, configSchema, type Config } from "./config.js";
export { createLogger, getLogger, type Logger, type LogLevel } from "./logger.js";
export {
  computeBackoff,
  sleepWithAbort,
  retryAsync,
  withTimeout,
  callCollaborator,
  type BackoffPolicy,
  type RetryOptions,
  type CollaboratorCallOptions,
} from "./retry.js";
export {
  isAbortError,
  isTransientError,
  classifyError,
  errorMessage,
  installUnhandledRejectionHandler,
  CollaboratorError,
  CollaboratorTimeoutError,
  type ErrorCategory,
} from "./errors.js";
export {
  enqueueInLane,
  conversationLane,
  getLaneSize,
  getActiveCount,
  clearLane,
  waitForDrain,
  resetAllLanes,
  CommandLaneClearedError,
} from "./command-queue.js";
export {
  registerHook,
  unregisterHook,
  clearHooks,
  triggerHook,
  createHookEvent,
  emitHook,
  getRegisteredHookKeys,
  HookEvents,
  type HookEvent,
  type HookHandler,
  type HookEventType,
} from "./hooks.js";
export type {
  MessageRole,
  MessageRecord,
  PersistedMessage,
  ConversationSummary,
  IncomingMessage,
} from "./types.js";
