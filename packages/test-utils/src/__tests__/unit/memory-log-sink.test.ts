import { describe, expect, it } from "vitest";
import { MemoryLogSink } from "../../memory-log-sink.js";

describe("MemoryLogSink", () => {
  it("records entries in order", () => {
    const sink = new MemoryLogSink();
    sink.append("RETRY_ATTEMPT: [NET_002] Attempt 1 after 2s delay", "medium");
    sink.append("[NET_002] | [Network] | [Medium] | x", "medium");

    expect(sink.withPrefix("RETRY_ATTEMPT:")).toHaveLength(1);
    expect(sink.entries[1]).toEqual({
      message: "[NET_002] | [Network] | [Medium] | x",
      severity: "medium",
    });
  });

  it("counts flushes", async () => {
    const sink = new MemoryLogSink();
    await sink.flush();
    expect(sink.flushCount).toBe(1);
  });
});
