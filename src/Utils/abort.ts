export type LinkedSignal = {
  signal: AbortSignal;
  /** Detach from the parent signals. Call once the linked signal is no longer needed. */
  dispose: () => void;
};

/** An AbortSignal that aborts as soon as any of `signals` does, with that signal's reason. */
export const linkSignals = (...signals: AbortSignal[]): LinkedSignal => {
  const controller = new AbortController();
  const detachers: (() => void)[] = [];

  for (const parent of signals) {
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    detachers.push(() => parent.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => detachers.forEach((detach) => detach()),
  };
};
