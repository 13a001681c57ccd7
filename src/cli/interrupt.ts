import { logError, logWarn } from "../utils/logger.js";

export type InterruptHandler = {
  signal: AbortSignal;
  /** Call on each SIGINT. */
  onInterrupt: () => void;
};

/**
 * First interrupt cancels the batch through `signal`; a graceful cancel is
 * not a program failure and leaves the exit code alone. A second interrupt
 * gives up on cleanup and calls `forceExit(130)`.
 */
export function createInterruptHandler(
  forceExit: (code: number) => void = (code) => process.exit(code)
): InterruptHandler {
  const controller = new AbortController();
  let interrupts = 0;
  return {
    signal: controller.signal,
    onInterrupt: () => {
      interrupts += 1;
      if (interrupts > 1) {
        logError("Interrupted twice; exiting without cleanup");
        forceExit(130);
        return;
      }
      logWarn("Cancelling: in-flight records go back to PENDING (Ctrl+C again to exit now)");
      controller.abort();
    },
  };
}
