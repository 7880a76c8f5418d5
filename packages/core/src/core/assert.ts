import { getRuntime } from "./runtime";

function fail(message: string): never {
  getRuntime().logError("ASSERT:", message);
  throw new Error(`ASSERT: ${message}`);
}

/**
 * Fail fast on a broken press integration.
 * The message reaches the runtime log before the throw, which usually lands in
 * an event listener or a timer callback.
 */
export function assert(condition: unknown, message: string): asserts condition {
  if (!condition) fail(message);
}

/** Timing constants and timer delays, in milliseconds. */
export function assertDuration(ms: unknown, name: string): asserts ms is number {
  assert(typeof ms === "number" && Number.isFinite(ms), `${name} must be a finite number of milliseconds`);
  assert(ms >= 0, `${name} must not be negative`);
}

/** What a `PressTree` query answered for one element. */
export function assertPressFlag(value: unknown, query: string): asserts value is boolean {
  assert(typeof value === "boolean", `${query} must answer true or false, got ${typeof value}`);
}

export function assertNever(x: never, what: string): never {
  return fail(`${what}: ${String(x)}`);
}
