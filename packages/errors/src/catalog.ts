/**
 * Error Catalog - Single Source of Truth
 *
 * Maps every error kind to its stable machine code and the static policy
 * attributes derived from it. Codes are persisted in log files and used as
 * retry buckets and statistics keys, so an existing mapping never changes;
 * new kinds get new codes.
 *
 * Naming convention: <DOMAIN>_<NNN>
 * Domains: NET, MDL, STG, MEM, GPU, CHT, EXP, SYS, USR
 */

import type { ErrorKindType } from "./kinds.js";

// ============================================================================
// SEVERITY
// ============================================================================

export const ERROR_SEVERITIES = ["low", "medium", "high", "critical"] as const;

export type ErrorSeverity = (typeof ERROR_SEVERITIES)[number];

export const SEVERITY_TITLES: Readonly<Record<ErrorSeverity, string>> = {
  low: "Low",
  medium: "Medium",
  high: "High",
  critical: "Critical",
};

// ============================================================================
// CATEGORY
// ============================================================================

export const ERROR_CATEGORIES = [
  "network",
  "storage",
  "model",
  "gpu",
  "memory",
  "user",
  "system",
  "chat",
  "export",
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export const CATEGORY_TITLES: Readonly<Record<ErrorCategory, string>> = {
  network: "Network",
  storage: "Storage",
  model: "Model",
  gpu: "GPU",
  memory: "Memory",
  user: "User",
  system: "System",
  chat: "Chat",
  export: "Export",
};

// ============================================================================
// CATALOG
// ============================================================================

export interface ErrorCatalogEntry {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly retryable: boolean;
}

export const ERROR_CATALOG = {
  // ==========================================================================
  // NETWORK
  // ==========================================================================
  networkUnavailable: { code: "NET_001", category: "network", severity: "medium", retryable: true },
  networkTimeout: { code: "NET_002", category: "network", severity: "medium", retryable: true },
  downloadFailed: { code: "NET_003", category: "network", severity: "medium", retryable: true },
  uploadFailed: { code: "NET_004", category: "network", severity: "medium", retryable: true },
  serverError: { code: "NET_005", category: "network", severity: "high", retryable: true },

  // ==========================================================================
  // MODEL
  // ==========================================================================
  modelNotFound: { code: "MDL_001", category: "model", severity: "high", retryable: false },
  modelLoadFailed: { code: "MDL_002", category: "model", severity: "high", retryable: true },
  modelCorrupted: { code: "MDL_003", category: "model", severity: "high", retryable: false },
  modelIncompatible: { code: "MDL_004", category: "model", severity: "low", retryable: false },
  modelDownloadFailed: { code: "MDL_005", category: "model", severity: "high", retryable: true },
  modelVerificationFailed: {
    code: "MDL_006",
    category: "model",
    severity: "high",
    retryable: true,
  },
  modelAlreadyExists: { code: "MDL_007", category: "model", severity: "low", retryable: false },

  // ==========================================================================
  // STORAGE
  // ==========================================================================
  insufficientStorage: { code: "STG_001", category: "storage", severity: "high", retryable: false },
  storageAccessDenied: {
    code: "STG_002",
    category: "storage",
    severity: "medium",
    retryable: false,
  },
  fileNotFound: { code: "STG_003", category: "storage", severity: "medium", retryable: false },
  fileCorrupted: { code: "STG_004", category: "storage", severity: "medium", retryable: false },
  diskFull: { code: "STG_005", category: "storage", severity: "high", retryable: false },

  // ==========================================================================
  // MEMORY
  // ==========================================================================
  outOfMemory: { code: "MEM_001", category: "memory", severity: "high", retryable: true },
  memoryAllocationFailed: { code: "MEM_002", category: "memory", severity: "high", retryable: true },
  memoryFragmentation: { code: "MEM_003", category: "memory", severity: "high", retryable: false },

  // ==========================================================================
  // GPU
  // ==========================================================================
  gpuNotAvailable: { code: "GPU_001", category: "gpu", severity: "low", retryable: false },
  gpuInitializationFailed: {
    code: "GPU_002",
    category: "gpu",
    severity: "medium",
    retryable: false,
  },
  gpuOperationFailed: { code: "GPU_003", category: "gpu", severity: "medium", retryable: true },
  gpuMemoryExhausted: { code: "GPU_004", category: "gpu", severity: "medium", retryable: true },

  // ==========================================================================
  // CHAT
  // ==========================================================================
  chatSessionExpired: { code: "CHT_001", category: "chat", severity: "low", retryable: false },
  messageValidationFailed: { code: "CHT_002", category: "chat", severity: "low", retryable: false },
  conversationLoadFailed: { code: "CHT_003", category: "chat", severity: "medium", retryable: true },
  conversationSaveFailed: { code: "CHT_004", category: "chat", severity: "medium", retryable: true },
  inferenceTimeout: { code: "CHT_005", category: "chat", severity: "medium", retryable: true },
  inferenceFailed: { code: "CHT_006", category: "chat", severity: "medium", retryable: true },

  // ==========================================================================
  // EXPORT
  // ==========================================================================
  exportFailed: { code: "EXP_001", category: "export", severity: "low", retryable: true },
  exportFormatUnsupported: { code: "EXP_002", category: "export", severity: "low", retryable: false },
  exportPermissionDenied: { code: "EXP_003", category: "export", severity: "low", retryable: false },

  // ==========================================================================
  // SYSTEM
  // ==========================================================================
  systemResourcesUnavailable: {
    code: "SYS_001",
    category: "system",
    severity: "high",
    retryable: true,
  },
  permissionDenied: { code: "SYS_002", category: "system", severity: "high", retryable: false },
  configurationError: { code: "SYS_003", category: "system", severity: "high", retryable: false },
  unexpectedError: { code: "SYS_004", category: "system", severity: "critical", retryable: false },

  // ==========================================================================
  // USER
  // ==========================================================================
  invalidInput: { code: "USR_001", category: "user", severity: "low", retryable: false },
  operationCancelled: { code: "USR_002", category: "user", severity: "low", retryable: false },
  featureNotAvailable: { code: "USR_003", category: "user", severity: "low", retryable: false },
} as const satisfies Record<ErrorKindType, ErrorCatalogEntry>;

/**
 * Policy applied to kinds the catalog does not know (for example a kind
 * deserialized from a newer build). Fails closed: shown, never retried.
 */
export const UNCATEGORIZED_ENTRY: ErrorCatalogEntry = {
  code: "SYS_000",
  category: "system",
  severity: "high",
  retryable: false,
};
