
import { assertDuration } from "./assert";
import { getRuntime, type CancelTimer } from "./runtime";

export type DeferredTask = {
  /** Run the task once after `ms`. Replaces any run still pending. */
  schedule(ms: number): void;
  cancel(): void;
  readonly pending: boolean;
};

export function createDeferredTask(name: string, fn: () => void): DeferredTask {
  let cancelPending: CancelTimer | null = null;

  const cancel = () => {
    if (cancelPending == null) return;
    cancelPending();
    cancelPending = null;
  };

  return {
    schedule(ms) {
      assertDuration(ms, `${name}.schedule(ms)`);

      cancel();
      cancelPending = getRuntime().setTimer(() => {
        cancelPending = null;
        fn();
      }, ms);
    },
    cancel,
    get pending() {
      return cancelPending != null;
    },
  };
}
