import { getLogger } from "@hodlchat/core";

const logger = getLogger("shutdown");

/**
 * Runs one shutdown step under its own timeout. A failing or hanging step
 * is logged and skipped so the remaining steps still run.
 */
export async function shutdownStep(
  label: string,
  fn: () => void | Promise<void>,
  timeoutMs: number,
): Promise<void> {
  const started = Date.now();
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    await Promise.race([
      Promise.resolve().then(fn),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
      }),
    ]);
    logger.debug({ step: label, elapsedMs: Date.now() - started }, "Shutdown step done");
  } catch (err) {
    logger.warn({ err, step: label, elapsedMs: Date.now() - started }, "Shutdown step failed, skipping");
  } finally {
    clearTimeout(timer);
  }
}
