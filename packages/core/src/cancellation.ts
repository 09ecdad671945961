import { CancelledError } from "./errors.js";

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError("operation cancelled", { cause: signal.reason });
  }
}
