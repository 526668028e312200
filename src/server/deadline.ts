import type { ServerResponse } from "node:http";

export interface Deadline {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Aborts after `timeoutMs` (0 disables the timer) or when the inbound
 * connection closes before the response has been fully written.
 */
export function createDeadline(res: ServerResponse, timeoutMs: number): Deadline {
  const controller = new AbortController();

  const timer =
    timeoutMs > 0
      ? setTimeout(() => controller.abort(new Error(`context deadline exceeded after ${timeoutMs}ms`)), timeoutMs)
      : undefined;

  const onClose = () => {
    if (!res.writableFinished) {
      controller.abort(new Error("inbound connection closed"));
    }
  };
  res.once("close", onClose);

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      res.off("close", onClose);
    },
  };
}
