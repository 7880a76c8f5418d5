export { exclude, isExcluded } from "@pressdetect/core";
export type { PressCallback, PressConfig } from "@pressdetect/core";

export * from "./press/tree.dom";
export * from "./press/classify";
export * from "./press/pressables";
export * from "./press/detector.dom";
