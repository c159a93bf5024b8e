export interface CancellableTimer {
  /** Resolves when the timer fires; never settles if cancelled first */
  readonly promise: Promise<void>;
  cancel(): void;
}

export function startTimer(ms: number): CancellableTimer {
  let handle: NodeJS.Timeout | undefined;
  const promise = new Promise<void>(resolve => {
    handle = setTimeout(resolve, Math.max(0, ms));
  });
  return {
    promise,
    cancel: () => { if (handle) { clearTimeout(handle); handle = undefined; } }
  };
}
