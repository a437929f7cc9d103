/**
 * The closed set of domain error kinds.
 *
 * Each member carries only its category-specific payload; code, severity,
 * category, retryability and recovery actions are derived by `classify()`
 * and never stored on the value.
 */

export type ErrorKind =
  // Network
  | { readonly type: "networkUnavailable" }
  | { readonly type: "networkTimeout" }
  | { readonly type: "downloadFailed"; readonly item: string; readonly cause?: unknown }
  | { readonly type: "uploadFailed"; readonly item: string; readonly cause?: unknown }
  | { readonly type: "serverError"; readonly status: number; readonly detail?: string }
  // Model
  | { readonly type: "modelNotFound"; readonly modelName: string }
  | { readonly type: "modelLoadFailed"; readonly modelName: string; readonly cause?: unknown }
  | { readonly type: "modelCorrupted"; readonly modelName: string }
  | { readonly type: "modelIncompatible"; readonly modelName: string; readonly reason: string }
  | { readonly type: "modelDownloadFailed"; readonly modelName: string; readonly cause?: unknown }
  | { readonly type: "modelVerificationFailed"; readonly modelName: string }
  | { readonly type: "modelAlreadyExists"; readonly modelName: string }
  // Storage
  | { readonly type: "insufficientStorage"; readonly requiredBytes: number; readonly availableBytes: number }
  | { readonly type: "storageAccessDenied" }
  | { readonly type: "fileNotFound"; readonly fileName: string }
  | { readonly type: "fileCorrupted"; readonly fileName: string }
  | { readonly type: "diskFull" }
  // Memory
  | { readonly type: "outOfMemory"; readonly requiredBytes: number; readonly availableBytes: number }
  | { readonly type: "memoryAllocationFailed" }
  | { readonly type: "memoryFragmentation" }
  // GPU
  | { readonly type: "gpuNotAvailable" }
  | { readonly type: "gpuInitializationFailed"; readonly cause?: unknown }
  | { readonly type: "gpuOperationFailed"; readonly operation: string; readonly cause?: unknown }
  | { readonly type: "gpuMemoryExhausted" }
  // Chat
  | { readonly type: "chatSessionExpired" }
  | { readonly type: "messageValidationFailed"; readonly reason: string }
  | { readonly type: "conversationLoadFailed"; readonly cause?: unknown }
  | { readonly type: "conversationSaveFailed"; readonly cause?: unknown }
  | { readonly type: "inferenceTimeout" }
  | { readonly type: "inferenceFailed"; readonly cause?: unknown }
  // Export
  | { readonly type: "exportFailed"; readonly format: string; readonly cause?: unknown }
  | { readonly type: "exportFormatUnsupported"; readonly format: string }
  | { readonly type: "exportPermissionDenied" }
  // System
  | { readonly type: "systemResourcesUnavailable" }
  | { readonly type: "permissionDenied"; readonly permission: string }
  | { readonly type: "configurationError"; readonly details: string }
  | { readonly type: "unexpectedError"; readonly cause: unknown }
  // User
  | { readonly type: "invalidInput"; readonly details: string }
  | { readonly type: "operationCancelled" }
  | { readonly type: "featureNotAvailable"; readonly feature: string };

export type ErrorKindType = ErrorKind["type"];

/** Narrow the union to a single member by its `type` tag. */
export type ErrorKindOf<T extends ErrorKindType> = Extract<ErrorKind, { readonly type: T }>;
