import { getLogger } from "./logger.js";

const logger = getLogger("command-queue");

export class CommandLaneClearedError extends Error {
  constructor(lane: string) {
    super(`Lane "${lane}" was cleared while a message was waiting`);
    this.name = "CommandLaneClearedError";
  }
}

interface QueuedTask {
  run: () => Promise<void>;
  cancel: (reason: unknown) => void;
  enqueuedAt: number;
}

interface Lane {
  waiting: QueuedTask[];
  running: boolean;
}

const SLOW_WAIT_MS = 2_000;

// One lane per conversation; a lane runs a single task at a time.
const lanes = new Map<string, Lane>();
const drainWaiters = new Set<() => void>();

function runningCount(): number {
  let count = 0;
  for (const lane of lanes.values()) if (lane.running) count++;
  return count;
}

function notifyIfDrained(): void {
  if (runningCount() > 0) return;
  for (const waiter of drainWaiters) waiter();
  drainWaiters.clear();
}

function next(name: string, lane: Lane): void {
  const task = lane.waiting.shift();
  if (!task) {
    lane.running = false;
    if (lanes.get(name) === lane) lanes.delete(name);
    notifyIfDrained();
    return;
  }

  lane.running = true;
  const waitMs = Date.now() - task.enqueuedAt;
  if (waitMs > SLOW_WAIT_MS) {
    logger.warn({ lane: name, waitMs }, "Message waited long for its lane");
  }
  void task.run().finally(() => next(name, lane));
}

export function conversationLane(conversationId: string): string {
  return `conversation:${conversationId}`;
}

/**
 * Runs `task` after everything already queued in `lane`. Tasks in one lane
 * never overlap and start in submission order; different lanes run freely.
 */
export function enqueueInLane<T>(lane: string, task: () => Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let state = lanes.get(lane);
    if (!state) {
      state = { waiting: [], running: false };
      lanes.set(lane, state);
    }
    state.waiting.push({
      run: () => task().then(resolve, reject),
      cancel: reject,
      enqueuedAt: Date.now(),
    });
    if (!state.running) next(lane, state);
  });
}

/** Tasks waiting (not running) in one lane, or in all of them. */
export function getLaneSize(lane?: string): number {
  if (lane) return lanes.get(lane)?.waiting.length ?? 0;
  let total = 0;
  for (const state of lanes.values()) total += state.waiting.length;
  return total;
}

export function getActiveCount(): number {
  return runningCount();
}

/** Rejects every waiting task in the lane; the running one finishes. */
export function clearLane(lane: string): number {
  const state = lanes.get(lane);
  if (!state) return 0;
  const dropped = state.waiting.splice(0);
  for (const task of dropped) task.cancel(new CommandLaneClearedError(lane));
  return dropped.length;
}

/** Resolves once no task is running, or with `drained: false` at the deadline. */
export function waitForDrain(timeoutMs: number): Promise<{ drained: boolean }> {
  if (runningCount() === 0) return Promise.resolve({ drained: true });

  return new Promise((resolve) => {
    const onDrain = () => {
      clearTimeout(timer);
      resolve({ drained: true });
    };
    const timer = setTimeout(() => {
      drainWaiters.delete(onDrain);
      resolve({ drained: false });
    }, timeoutMs);
    drainWaiters.add(onDrain);
  });
}

/** Drops every lane. Tests only. */
export function resetAllLanes(): void {
  for (const name of lanes.keys()) clearLane(name);
  lanes.clear();
}
