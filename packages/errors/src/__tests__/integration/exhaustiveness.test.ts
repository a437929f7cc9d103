import { describe, expect, it } from "vitest";
import {
  AppError,
  ERROR_CATALOG,
  type ErrorCategory,
  type ErrorKind,
  getAllErrorKindTypes,
} from "../../index.js";
import { allSampleKinds, sampleKinds } from "../fixtures/sample-kinds.js";

describe("Exhaustive type checking with the kind tag", () => {
  it("has a sample for every catalog entry", () => {
    expect(Object.keys(sampleKinds).sort()).toEqual(getAllErrorKindTypes().sort());
  });

  it("should enable exhaustive switch on category", () => {
    function routeTo(category: ErrorCategory): string {
      switch (category) {
        case "network":
        case "storage":
        case "model":
        case "gpu":
        case "memory":
        case "chat":
        case "export":
          return "feature";
        case "user":
          return "input";
        case "system":
          return "platform";
        default: {
          const unreachable: never = category;
          throw new Error(`Unhandled category: ${String(unreachable)}`);
        }
      }
    }

    for (const kind of allSampleKinds) {
      expect(["feature", "input", "platform"]).toContain(
        routeTo(ERROR_CATALOG[kind.type].category),
      );
    }
  });

  it("agrees with the catalog for every kind", () => {
    for (const kind of allSampleKinds) {
      const error = new AppError(kind);
      const entry = ERROR_CATALOG[kind.type];
      expect(error.code).toBe(entry.code);
      expect(error.severity).toBe(entry.severity);
      expect(error.category).toBe(entry.category);
      expect(error.retryable).toBe(entry.retryable);
    }
  });

  it("narrows payloads by tag", () => {
    function payloadSummary(kind: ErrorKind): string {
      switch (kind.type) {
        case "insufficientStorage":
        case "outOfMemory":
          return `${kind.requiredBytes}>${kind.availableBytes}`;
        case "serverError":
          return String(kind.status);
        default:
          return kind.type;
      }
    }

    expect(payloadSummary(sampleKinds.serverError)).toBe("503");
    expect(payloadSummary(sampleKinds.outOfMemory)).toBe("314572800>104857600");
    expect(payloadSummary(sampleKinds.diskFull)).toBe("diskFull");
  });
});
