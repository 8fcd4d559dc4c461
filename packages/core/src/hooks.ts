import { getLogger } from "./logger.js";

const logger = getLogger("hooks");

/**
 * Map-based pub-sub for engine events. Handlers observe, they never steer:
 * a throwing handler is logged and the pipeline carries on.
 */

// ─── Event Types ─────────────────────────────────────────────

export type HookEventType =
  | "flow"
  | "tx"
  | "security"
  | "conversation"
  | "lifecycle";

export interface HookEvent {
  /** Event category */
  type: HookEventType;
  /** Specific action within the category (e.g. "transition") */
  action: string;
  /** Full event key: "type:action" */
  key: string;
  /** Unix timestamp (ms) */
  timestamp: number;
  /** Contextual data specific to the event */
  data: Record<string, unknown>;
}

export type HookHandler = (event: HookEvent) => Promise<void> | void;

// ─── Well-known Event Keys ───────────────────────────────────

export const HookEvents = {
  // Send flow
  FLOW_TRANSITION: "flow:transition",
  FLOW_MODIFIED: "flow:modified",
  FLOW_PAUSED: "flow:paused",

  // Broadcast
  TX_BEFORE_BROADCAST: "tx:before_broadcast",
  TX_AFTER_BROADCAST: "tx:after_broadcast",
  TX_FAILED: "tx:failed",
  TX_UNCONFIRMED: "tx:unconfirmed",
  TX_RECONCILED: "tx:reconciled",
  TX_DUPLICATE_CONFIRM: "tx:duplicate_confirm",

  // Security
  SECURITY_RECOVERY_PHRASE_BLOCKED: "security:recovery_phrase_blocked",

  // Conversations
  CONVERSATION_CREATED: "conversation:created",
  CONVERSATION_RESET: "conversation:reset",
  CONVERSATION_REPLAYED: "conversation:replayed",

  // App lifecycle
  LIFECYCLE_STARTUP: "lifecycle:startup",
  LIFECYCLE_SHUTDOWN: "lifecycle:shutdown",
} as const;

// ─── Hook Registry (singleton) ───────────────────────────────

const handlers = new Map<string, Set<HookHandler>>();

/**
 * Register a handler for a hook event.
 * Supports both category-level ("tx") and specific ("tx:after_broadcast") keys.
 */
export function registerHook(eventKey: string, handler: HookHandler): void {
  let set = handlers.get(eventKey);
  if (!set) {
    set = new Set();
    handlers.set(eventKey, set);
  }
  set.add(handler);
  logger.debug({ eventKey }, "Hook registered");
}

export function unregisterHook(eventKey: string, handler: HookHandler): void {
  const set = handlers.get(eventKey);
  if (set) {
    set.delete(handler);
    if (set.size === 0) {
      handlers.delete(eventKey);
    }
  }
}

/**
 * Clear all registered hooks. Primarily for testing.
 */
export function clearHooks(): void {
  handlers.clear();
}

export function getRegisteredHookKeys(): string[] {
  return Array.from(handlers.keys());
}

/**
 * Trigger a hook event. Dispatches to:
 * 1. Handlers registered for the exact "type:action" key
 * 2. Handlers registered for the category "type" key
 */
export async function triggerHook(event: HookEvent): Promise<void> {
  const keys = [event.key, event.type];

  for (const key of keys) {
    const set = handlers.get(key);
    if (!set) continue;

    for (const handler of set) {
      try {
        await handler(event);
      } catch (err) {
        logger.error({ err, eventKey: key }, "Hook handler error");
      }
    }
  }
}

export function createHookEvent(
  type: HookEventType,
  action: string,
  data: Record<string, unknown> = {},
): HookEvent {
  return {
    type,
    action,
    key: `${type}:${action}`,
    timestamp: Date.now(),
    data,
  };
}

/**
 * Fire-and-forget variant for synchronous call sites.
 */
export function emitHook(
  type: HookEventType,
  action: string,
  data: Record<string, unknown> = {},
): void {
  triggerHook(createHookEvent(type, action, data)).catch((err: unknown) => {
    logger.error({ err, type, action }, "Hook dispatch failed");
  });
}
