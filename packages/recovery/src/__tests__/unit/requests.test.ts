import { afterEach, describe, expect, it, vi } from "vitest";
import { RecoveryRequestBus } from "../../requests.js";

describe("RecoveryRequestBus", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("emits each request with its payload", () => {
    const bus = new RecoveryRequestBus();
    const redownload = vi.fn();
    const support = vi.fn();
    const settings = vi.fn();
    const restart = vi.fn();
    bus.on("redownloadModel", redownload);
    bus.on("contactSupport", support);
    bus.on("openSettings", settings);
    bus.on("restart", restart);

    bus.requestRedownload("tiny-chat");
    bus.requestContactSupport("Error Code: NET_001");
    bus.requestOpenSettings("network");
    bus.requestOpenSettings();
    bus.requestRestart();

    expect(redownload).toHaveBeenCalledWith({ modelName: "tiny-chat" });
    expect(support).toHaveBeenCalledWith({ diagnosticText: "Error Code: NET_001" });
    expect(settings).toHaveBeenNthCalledWith(1, { section: "network" });
    expect(settings).toHaveBeenNthCalledWith(2, {});
    expect(restart).toHaveBeenCalledTimes(1);
  });

  it("emits the payload-free requests", () => {
    const bus = new RecoveryRequestBus();
    const seen: string[] = [];
    bus.on("clearCache", () => seen.push("clearCache"));
    bus.on("freeMemory", () => seen.push("freeMemory"));
    bus.on("navigateToStorage", () => seen.push("navigateToStorage"));
    bus.on("switchFallbackModel", () => seen.push("switchFallbackModel"));

    bus.requestClearCache();
    bus.requestFreeMemory();
    bus.requestNavigateToStorage();
    bus.requestSwitchFallbackModel();

    expect(seen).toEqual(["clearCache", "freeMemory", "navigateToStorage", "switchFallbackModel"]);
  });

  it("does nothing without listeners", () => {
    expect(() => new RecoveryRequestBus().requestClearCache()).not.toThrow();
  });

  it("reports a throwing listener to the fallback channel", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const bus = new RecoveryRequestBus();
    bus.on("freeMemory", () => {
      throw new Error("listener broke");
    });

    expect(() => bus.requestFreeMemory()).not.toThrow();
    expect(warn).toHaveBeenCalledWith("[@lumen/recovery] 'freeMemory' listener failed: listener broke");
  });
});
