import { describe, expect, it } from "vitest";
import { actionDescription, actionTitle, isSameAction, RecoveryActions } from "../../index.js";

describe("recovery actions", () => {
  it("titles each action", () => {
    expect(actionTitle(RecoveryActions.retry)).toBe("Try Again");
    expect(actionTitle(RecoveryActions.retryWithDelay(5))).toBe("Retry");
    expect(actionTitle(RecoveryActions.switchFallbackModel)).toBe("Use Different Model");
    expect(actionTitle(RecoveryActions.redownloadModel("m"))).toBe("Redownload Model");
  });

  it("describes parameterized actions with their payload", () => {
    expect(actionDescription(RecoveryActions.retryWithDelay(10))).toBe(
      "Wait 10 seconds and try again",
    );
    expect(actionDescription(RecoveryActions.redownloadModel("test-model"))).toBe(
      "Redownload the test-model model",
    );
  });

  it("describes plain actions", () => {
    expect(actionDescription(RecoveryActions.checkStorage)).toBe("Free up device storage space");
    expect(actionDescription(RecoveryActions.dismiss)).toBe("Dismiss this error");
  });

  it("compares actions structurally", () => {
    expect(isSameAction(RecoveryActions.retryWithDelay(5), RecoveryActions.retryWithDelay(5))).toBe(
      true,
    );
    expect(isSameAction(RecoveryActions.retryWithDelay(5), RecoveryActions.retryWithDelay(10))).toBe(
      false,
    );
    expect(isSameAction(RecoveryActions.redownloadModel("a"), RecoveryActions.redownloadModel("b"))).toBe(
      false,
    );
    expect(isSameAction(RecoveryActions.clearCache, { type: "clearCache" })).toBe(true);
    expect(isSameAction(RecoveryActions.clearCache, RecoveryActions.freeMemory)).toBe(false);
  });
});
