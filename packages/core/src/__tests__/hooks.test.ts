import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  registerHook,
  unregisterHook,
  clearHooks,
  triggerHook,
  createHookEvent,
  emitHook,
  getRegisteredHookKeys,
  HookEvents,
} from "../hooks.js";

describe("Hook System", () => {
  beforeEach(() => {
    clearHooks();
  });

  describe("registerHook / unregisterHook", () => {
    it("registers and triggers a handler", async () => {
      const handler = vi.fn();
      registerHook(HookEvents.FLOW_TRANSITION, handler);

      const event = createHookEvent("flow", "transition", { from: "idle", to: "awaitingAddress" });
      await triggerHook(event);

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith(event);
    });

    it("unregisters a handler", async () => {
      const handler = vi.fn();
      registerHook(HookEvents.TX_AFTER_BROADCAST, handler);
      unregisterHook(HookEvents.TX_AFTER_BROADCAST, handler);

      await triggerHook(createHookEvent("tx", "after_broadcast"));
      expect(handler).not.toHaveBeenCalled();
      expect(getRegisteredHookKeys()).toEqual([]);
    });
  });

  describe("triggerHook", () => {
    it("dispatches to both specific and category handlers", async () => {
      const specificHandler = vi.fn();
      const categoryHandler = vi.fn();

      registerHook("tx:before_broadcast", specificHandler);
      registerHook("tx", categoryHandler);

      await triggerHook(createHookEvent("tx", "before_broadcast"));

      expect(specificHandler).toHaveBeenCalledOnce();
      expect(categoryHandler).toHaveBeenCalledOnce();
    });

    it("does not dispatch to unrelated handlers", async () => {
      const handler = vi.fn();
      registerHook(HookEvents.SECURITY_RECOVERY_PHRASE_BLOCKED, handler);

      await triggerHook(createHookEvent("tx", "failed"));
      expect(handler).not.toHaveBeenCalled();
    });

    it("isolates handler errors", async () => {
      const failing = vi.fn().mockRejectedValue(new Error("boom"));
      const healthy = vi.fn();

      registerHook("tx:failed", failing);
      registerHook("tx:failed", healthy);

      await triggerHook(createHookEvent("tx", "failed"));

      expect(failing).toHaveBeenCalledOnce();
      expect(healthy).toHaveBeenCalledOnce();
    });
  });

  describe("emitHook", () => {
    it("dispatches without being awaited", async () => {
      const handler = vi.fn();
      registerHook("conversation", handler);

      emitHook("conversation", "reset", { conversationId: "c1" });
      await vi.waitFor(() => expect(handler).toHaveBeenCalledOnce());

      const [event] = handler.mock.calls[0];
      expect(event.key).toBe("conversation:reset");
      expect(event.data).toEqual({ conversationId: "c1" });
    });
  });

  describe("createHookEvent", () => {
    it("creates a properly structured event", () => {
      const event = createHookEvent("security", "recovery_phrase_blocked", { words: 12 });

      expect(event.type).toBe("security");
      expect(event.action).toBe("recovery_phrase_blocked");
      expect(event.key).toBe("security:recovery_phrase_blocked");
      expect(event.timestamp).toBeGreaterThan(0);
      expect(event.data).toEqual({ words: 12 });
    });

    it("defaults data to empty object", () => {
      expect(createHookEvent("lifecycle", "startup").data).toEqual({});
    });
  });

  it("exposes well-known keys matching type:action", () => {
    expect(HookEvents.FLOW_TRANSITION).toBe("flow:transition");
    expect(HookEvents.TX_DUPLICATE_CONFIRM).toBe("tx:duplicate_confirm");
    expect(HookEvents.CONVERSATION_REPLAYED).toBe("conversation:replayed");
    expect(HookEvents.LIFECYCLE_SHUTDOWN).toBe("lifecycle:shutdown");
  });
});
