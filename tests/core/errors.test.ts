import { AdaptestError, ERROR_CODES, createModuleError, isAdaptestError } from "@adaptest/core/errors";
import { describe, expect, test } from "vitest";

describe("AdaptestError", () => {
  test("createModuleError produces AdaptestError with correct fields", () => {
    const err = createModuleError("session", ERROR_CODES.ITEM_POOL_EMPTY, "No items", {
      recoverable: true,
      fallback: "Choose a different topic",
    });

    expect(err).toBeInstanceOf(AdaptestError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("AdaptestError");
    expect(err.message).toBe("No items");
    expect(err.moduleError.module).toBe("session");
    expect(err.moduleError.code).toBe("SESS_POOL_001");
    expect(err.moduleError.severity).toBe("error");
    expect(err.moduleError.recoverable).toBe(true);
    expect(err.moduleError.fallback).toBe("Choose a different topic");
  });

  test("isRecoverable defaults to false", () => {
    const err = createModuleError("storage", ERROR_CODES.SESSION_NOT_FOUND, "Missing");
    expect(err.isRecoverable).toBe(false);
    expect(err.code).toBe("STOR_NF_001");
  });

  test("severity getter returns the correct severity level", () => {
    const warningErr = createModuleError("config", ERROR_CODES.CONFIG_INVALID, "Bad", {
      severity: "warning",
    });
    expect(warningErr.severity).toBe("warning");

    const fatalErr = createModuleError("storage", ERROR_CODES.SESSION_CONFLICT, "Stale", {
      severity: "fatal",
    });
    expect(fatalErr.severity).toBe("fatal");
  });

  test("isAdaptestError narrows by code", () => {
    const err = createModuleError("snapshot", ERROR_CODES.SNAPSHOT_INVALID, "Tampered");

    expect(isAdaptestError(err)).toBe(true);
    expect(isAdaptestError(err, ERROR_CODES.SNAPSHOT_INVALID)).toBe(true);
    expect(isAdaptestError(err, ERROR_CODES.CONFIG_INVALID)).toBe(false);
    expect(isAdaptestError(new Error("plain"))).toBe(false);
    expect(isAdaptestError("SNAP_INV_001")).toBe(false);
  });

  test("all ERROR_CODES are distinct non-empty strings", () => {
    const values = Object.values(ERROR_CODES);
    expect(values).toHaveLength(10);
    expect(new Set(values).size).toBe(values.length);
    for (const value of values) {
      expect(value.length).toBeGreaterThan(0);
    }
  });
});
