export const PACKAGE_NAME = "@lumen/core" as const;

export type { Clock, TimerId } from "./clock-types.js";
export { defaultClock } from "./clock.js";
export { describeThrown, logWarn } from "./log-warn.js";
