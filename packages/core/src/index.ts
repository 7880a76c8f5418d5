export * from "./core/runtime";
export * from "./core/assert";
export * from "./core/callbacks";
export * from "./core/timer";

export * from "./model/types";
export * from "./model/config";
export * from "./model/exclusion";
export * from "./model/search";
export * from "./model/detector";
