export const PACKAGE_NAME = "@lumen/test-utils" as const;

export { flushMicrotasks } from "./flush.js";
export { type MemoryLogEntry, MemoryLogSink } from "./memory-log-sink.js";
export { createTestClock, type PendingTimer, type TestClock } from "./test-clock.js";
