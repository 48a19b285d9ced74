import type { ModuleError } from "@adaptest/lib/types";

export class AdaptestError extends Error {
  constructor(public readonly moduleError: ModuleError) {
    super(moduleError.message);
    this.name = "AdaptestError";
  }

  get code(): string {
    return this.moduleError.code;
  }

  get isRecoverable(): boolean {
    return this.moduleError.recoverable;
  }

  get severity(): string {
    return this.moduleError.severity;
  }
}

export function createModuleError(
  module: string,
  code: string,
  message: string,
  opts?: Partial<ModuleError>,
): AdaptestError {
  return new AdaptestError({
    module,
    severity: "error",
    code,
    message,
    recoverable: false,
    ...opts,
  });
}

export function isAdaptestError(err: unknown, code?: string): err is AdaptestError {
  return err instanceof AdaptestError && (code === undefined || err.code === code);
}

export const ERROR_CODES = {
  ITEM_POOL_EMPTY: "SESS_POOL_001",
  INVALID_SESSION_STATE: "SESS_STATE_002",
  UNKNOWN_OR_DUPLICATE_ITEM: "SESS_ITEM_003",
  INVALID_RESPONSE: "SESS_RESP_004",
  SNAPSHOT_INVALID: "SNAP_INV_001",
  SESSION_NOT_FOUND: "STOR_NF_001",
  SESSION_CONFLICT: "STOR_CONF_002",
  ITEM_BANK_INVALID: "BANK_INV_001",
  CONFIG_INVALID: "CONF_INV_001",
  CONFIG_NOT_FOUND: "CONF_NF_002",
} as const;
