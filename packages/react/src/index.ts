export * from "./usePressDetector";
