import { QueryCancelled } from "@typesLocal/AppError";

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new QueryCancelled();
  }
}

export function isAbortError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }
  const name = Reflect.get(error, "name");
  return name === "AbortError" || name === "APIUserAbortError";
}

export interface LinkedAbort {
  signal: AbortSignal;
  abort(reason?: unknown): void;
  dispose(): void;
}

/**
 * A controller that aborts when any parent signal aborts. dispose() detaches
 * the listeners so long-lived parents do not accumulate them.
 */
export function linkAbort(...parents: Array<AbortSignal | undefined>): LinkedAbort {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = (): void => controller.abort(parent.reason);
    parent.addEventListener("abort", onAbort, { once: true });
    detachers.push(() => parent.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    abort: (reason?: unknown) => controller.abort(reason),
    dispose: () => {
      for (const detach of detachers) detach();
    },
  };
}

/** setTimeout as a promise; rejects with QueryCancelled when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new QueryCancelled());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new QueryCancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
