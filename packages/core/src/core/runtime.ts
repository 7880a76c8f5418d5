
export type CancelTimer = () => void;

export type Runtime = {
  /** Run `fn` once after `ms` milliseconds. Returns a function that cancels the run. */
  setTimer: (fn: () => void, ms: number) => CancelTimer;

  /** Logging hook (can be replaced in production). */
  logError: (...args: unknown[]) => void;
};

const defaultRuntime: Runtime = {
  // resolve the global timer at call time so fake timers installed later still apply
  setTimer: (fn, ms) => {
    const handle = globalThis.setTimeout(fn, ms);
    return () => globalThis.clearTimeout(handle);
  },
  logError: (...args) => {
    // eslint-disable-next-line no-console
    console.error(...args);
  },
};

let runtime: Runtime = defaultRuntime;

export function getRuntime(): Runtime {
  return runtime;
}

/**
 * Inject a runtime from the host platform (web, node, react-native, etc).
 * This is how core stays DOM-free.
 */
export function setRuntime(next: Partial<Runtime>) {
  runtime = { ...runtime, ...next };
}

/** Restore the default runtime (tests). */
export function resetRuntime() {
  runtime = defaultRuntime;
}
