import { describe, expect, it } from "vitest";
import {
  ERROR_CATALOG,
  ERROR_CATEGORIES,
  getAllErrorKindTypes,
  getCatalogEntry,
  isErrorKindType,
  validateCatalog,
} from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("should pass catalog validation", () => {
    expect(validateCatalog()).toEqual({ valid: true, errors: [] });
  });

  it("should have unique codes", () => {
    const codes = Object.values(ERROR_CATALOG).map((e) => e.code);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it("should cover every category", () => {
    const categories = new Set(Object.values(ERROR_CATALOG).map((e) => e.category));
    for (const category of ERROR_CATEGORIES) {
      expect(categories).toContain(category);
    }
  });

  it("should prefix codes by category", () => {
    const prefixes: Record<string, string> = {
      network: "NET",
      model: "MDL",
      storage: "STG",
      memory: "MEM",
      gpu: "GPU",
      chat: "CHT",
      export: "EXP",
      system: "SYS",
      user: "USR",
    };
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.code.slice(0, 3)).toBe(prefixes[entry.category]);
    }
  });

  it("should keep persisted codes stable", () => {
    expect(ERROR_CATALOG.networkUnavailable.code).toBe("NET_001");
    expect(ERROR_CATALOG.networkTimeout.code).toBe("NET_002");
    expect(ERROR_CATALOG.modelNotFound.code).toBe("MDL_001");
    expect(ERROR_CATALOG.insufficientStorage.code).toBe("STG_001");
    expect(ERROR_CATALOG.outOfMemory.code).toBe("MEM_001");
    expect(ERROR_CATALOG.unexpectedError.code).toBe("SYS_004");
    expect(ERROR_CATALOG.featureNotAvailable.code).toBe("USR_003");
  });

  it("should mark only unexpected errors as critical", () => {
    const critical = getAllErrorKindTypes().filter(
      (type) => ERROR_CATALOG[type].severity === "critical",
    );
    expect(critical).toEqual(["unexpectedError"]);
  });
});

describe("catalog helpers", () => {
  it("getCatalogEntry returns the entry for a kind", () => {
    expect(getCatalogEntry("serverError")).toEqual({
      code: "NET_005",
      category: "network",
      severity: "high",
      retryable: true,
    });
  });

  it("getAllErrorKindTypes lists every kind once", () => {
    const types = getAllErrorKindTypes();
    expect(types).toHaveLength(40);
    expect(new Set(types).size).toBe(40);
    expect(types[0]).toBe("networkUnavailable");
  });

  it("isErrorKindType accepts known tags only", () => {
    expect(isErrorKindType("diskFull")).toBe(true);
    expect(isErrorKindType("toString")).toBe(false);
    expect(isErrorKindType("DISK_FULL")).toBe(false);
  });
});
