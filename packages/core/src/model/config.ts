
import { assertDuration } from "../core/assert";
import type { PressConfig } from "./types";

export const DEFAULT_PRESS_CONFIG: Readonly<PressConfig> = {
  tapTimeout: 100,
  pressedStateDuration: 64,
};

export function resolvePressConfig(partial: Partial<PressConfig> = {}): PressConfig {
  const cfg: PressConfig = {
    tapTimeout: partial.tapTimeout ?? DEFAULT_PRESS_CONFIG.tapTimeout,
    pressedStateDuration: partial.pressedStateDuration ?? DEFAULT_PRESS_CONFIG.pressedStateDuration,
  };

  assertDuration(cfg.tapTimeout, "PressConfig.tapTimeout");
  assertDuration(cfg.pressedStateDuration, "PressConfig.pressedStateDuration");

  return cfg;
}
