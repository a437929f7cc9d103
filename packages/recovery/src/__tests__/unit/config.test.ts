import { defaultClock } from "@lumen/core";
import { AppError } from "@lumen/errors";
import { LogSanitizer } from "@lumen/sanitize";
import { createTestClock, MemoryLogSink } from "@lumen/test-utils";
import { describe, expect, it } from "vitest";
import { resolveRecoveryConfig } from "../../config.js";
import { RecoveryRequestBus } from "../../requests.js";

describe("resolveRecoveryConfig", () => {
  it("applies defaults", () => {
    const logSink = new MemoryLogSink();
    const config = resolveRecoveryConfig({ logSink });

    expect(config.maxAttempts).toBe(3);
    expect(config.baseDelayMs).toBe(2000);
    expect(config.historyCapacity).toBe(100);
    expect(config.appVersion).toBe("unknown");
    expect(config.logSink).toBe(logSink);
    expect(config.clock).toBe(defaultClock);
    expect(config.sanitizer).toBeInstanceOf(LogSanitizer);
    expect(config.requests).toBeInstanceOf(RecoveryRequestBus);
    expect(config.deviceInfo.collect().appVersion).toBe("unknown");
  });

  it("keeps supplied collaborators", () => {
    const clock = createTestClock();
    const requests = new RecoveryRequestBus();
    const config = resolveRecoveryConfig({
      logSink: new MemoryLogSink(),
      clock,
      requests,
      maxAttempts: 5,
      appVersion: "4.2.0",
    });

    expect(config.clock).toBe(clock);
    expect(config.requests).toBe(requests);
    expect(config.maxAttempts).toBe(5);
    expect(config.deviceInfo.collect().appVersion).toBe("4.2.0");
  });

  it("rejects invalid values with a configuration error", () => {
    let caught: unknown;
    try {
      resolveRecoveryConfig({ logSink: new MemoryLogSink(), maxAttempts: 0, baseDelayMs: 1.5 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    if (!(caught instanceof AppError)) return;
    expect(caught.code).toBe("SYS_003");
    expect(caught.message).toContain("Invalid recovery config: maxAttempts:");
    expect(caught.message).toContain("; baseDelayMs:");
  });
});
