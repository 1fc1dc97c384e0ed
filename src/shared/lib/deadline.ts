/** An abort signal that fires on the parent's abort or after `timeoutMs`. */
export interface Deadline {
  readonly signal: AbortSignal;
  /** True when the timer, not the parent, aborted the signal. */
  timedOut(): boolean;
  /** Clears the timer and detaches from the parent. Safe to call twice. */
  dispose(): void;
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = () => controller.abort(parent?.reason);

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Deadline of ${timeoutMs}ms exceeded`));
  }, timeoutMs);
  timer.unref();

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
