import {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCategory,
  type ErrorSeverity,
  UNCATEGORIZED_ENTRY,
} from "./catalog.js";
import type { ErrorKind } from "./kinds.js";
import { type RecoveryAction, RecoveryActions } from "./recovery-actions.js";

/**
 * Everything derived from an error kind. Pure: the same kind always yields
 * an equal classification.
 */
export interface ErrorClassification {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly retryable: boolean;
  readonly message: string;
  readonly recoveryActions: readonly RecoveryAction[];
}

const BYTES_PER_GB = 1024 * 1024 * 1024;
const BYTES_PER_MB = 1024 * 1024;

const formatGB = (bytes: number): string => (bytes / BYTES_PER_GB).toFixed(1);
const formatMB = (bytes: number): string => (bytes / BYTES_PER_MB).toFixed(0);

const { retry, clearCache, freeMemory, restartApp, checkNetwork, checkStorage, dismiss } =
  RecoveryActions;
const { contactSupport, openSettings, switchFallbackModel } = RecoveryActions;

interface Derived {
  readonly entry: ErrorCatalogEntry;
  readonly message: string;
  readonly actions: readonly RecoveryAction[];
}

function derive(kind: ErrorKind): Derived {
  switch (kind.type) {
    case "networkUnavailable":
      return {
        entry: ERROR_CATALOG.networkUnavailable,
        message: "No internet connection available. Please check your network settings.",
        actions: [checkNetwork, RecoveryActions.retryWithDelay(5), dismiss],
      };
    case "networkTimeout":
      return {
        entry: ERROR_CATALOG.networkTimeout,
        message: "The request took too long to complete. Please try again.",
        actions: [checkNetwork, RecoveryActions.retryWithDelay(5), dismiss],
      };
    case "downloadFailed":
      return {
        entry: ERROR_CATALOG.downloadFailed,
        message: `Failed to download ${kind.item}. Please check your connection and try again.`,
        actions: [retry, checkNetwork, dismiss],
      };
    case "uploadFailed":
      return {
        entry: ERROR_CATALOG.uploadFailed,
        message: `Failed to upload ${kind.item}. Please check your connection and try again.`,
        actions: [retry, checkNetwork, dismiss],
      };
    case "serverError":
      return {
        entry: ERROR_CATALOG.serverError,
        message: `Server error (${kind.status}). Please try again later.`,
        actions: [RecoveryActions.retryWithDelay(10), contactSupport, dismiss],
      };

    case "modelNotFound":
      return {
        entry: ERROR_CATALOG.modelNotFound,
        message: `The model '${kind.modelName}' could not be found. Please try downloading it again.`,
        actions: [RecoveryActions.redownloadModel(kind.modelName), dismiss],
      };
    case "modelLoadFailed":
      return {
        entry: ERROR_CATALOG.modelLoadFailed,
        message: `Failed to load the '${kind.modelName}' model. The file may be corrupted.`,
        actions: [RecoveryActions.redownloadModel(kind.modelName), restartApp, dismiss],
      };
    case "modelCorrupted":
      return {
        entry: ERROR_CATALOG.modelCorrupted,
        message: `The '${kind.modelName}' model file is corrupted. Please redownload it.`,
        actions: [RecoveryActions.redownloadModel(kind.modelName), dismiss],
      };
    case "modelIncompatible":
      return {
        entry: ERROR_CATALOG.modelIncompatible,
        message: `The '${kind.modelName}' model is not compatible: ${kind.reason}`,
        actions: [switchFallbackModel, dismiss],
      };
    case "modelDownloadFailed":
      return {
        entry: ERROR_CATALOG.modelDownloadFailed,
        message: `Failed to download the '${kind.modelName}' model. Please try again.`,
        actions: [retry, checkNetwork, checkStorage, dismiss],
      };
    case "modelVerificationFailed":
      return {
        entry: ERROR_CATALOG.modelVerificationFailed,
        message: `The '${kind.modelName}' model failed verification. Please redownload it.`,
        actions: [RecoveryActions.redownloadModel(kind.modelName), dismiss],
      };
    case "modelAlreadyExists":
      return {
        entry: ERROR_CATALOG.modelAlreadyExists,
        message: `The '${kind.modelName}' model is already downloaded.`,
        actions: [dismiss],
      };

    case "insufficientStorage":
      return {
        entry: ERROR_CATALOG.insufficientStorage,
        message: `Not enough storage space. Need ${formatGB(kind.requiredBytes)}GB, but only ${formatGB(kind.availableBytes)}GB available.`,
        actions: [checkStorage, clearCache, dismiss],
      };
    case "storageAccessDenied":
      return {
        entry: ERROR_CATALOG.storageAccessDenied,
        message: "Cannot access device storage. Please check app permissions.",
        actions: [openSettings, dismiss],
      };
    case "fileNotFound":
      return {
        entry: ERROR_CATALOG.fileNotFound,
        message: `The file '${kind.fileName}' could not be found.`,
        actions: [retry, clearCache, dismiss],
      };
    case "fileCorrupted":
      return {
        entry: ERROR_CATALOG.fileCorrupted,
        message: `The file '${kind.fileName}' is corrupted or unreadable.`,
        actions: [retry, clearCache, dismiss],
      };
    case "diskFull":
      return {
        entry: ERROR_CATALOG.diskFull,
        message: "Device storage is full. Please free up space and try again.",
        actions: [checkStorage, clearCache, dismiss],
      };

    case "outOfMemory":
      return {
        entry: ERROR_CATALOG.outOfMemory,
        message: `Not enough memory. Need ${formatMB(kind.requiredBytes)}MB, but only ${formatMB(kind.availableBytes)}MB available.`,
        actions: [freeMemory, restartApp, dismiss],
      };
    case "memoryAllocationFailed":
      return {
        entry: ERROR_CATALOG.memoryAllocationFailed,
        message: "Failed to allocate memory. Please close other apps and try again.",
        actions: [freeMemory, restartApp, dismiss],
      };
    case "memoryFragmentation":
      return {
        entry: ERROR_CATALOG.memoryFragmentation,
        message: "Memory is fragmented. Please restart the app.",
        actions: [freeMemory, restartApp, dismiss],
      };

    case "gpuNotAvailable":
      return {
        entry: ERROR_CATALOG.gpuNotAvailable,
        message: "GPU acceleration is not available on this device.",
        actions: [dismiss],
      };
    case "gpuInitializationFailed":
      return {
        entry: ERROR_CATALOG.gpuInitializationFailed,
        message: "Failed to initialize GPU acceleration.",
        actions: [retry, restartApp, dismiss],
      };
    case "gpuOperationFailed":
      return {
        entry: ERROR_CATALOG.gpuOperationFailed,
        message: `GPU operation '${kind.operation}' failed. Falling back to CPU processing.`,
        actions: [retry, restartApp, dismiss],
      };
    case "gpuMemoryExhausted":
      return {
        entry: ERROR_CATALOG.gpuMemoryExhausted,
        message: "GPU memory is exhausted. Please try with a smaller model.",
        actions: [retry, restartApp, dismiss],
      };

    case "chatSessionExpired":
      return {
        entry: ERROR_CATALOG.chatSessionExpired,
        message: "Your chat session has expired. Please start a new conversation.",
        actions: [dismiss],
      };
    case "messageValidationFailed":
      return {
        entry: ERROR_CATALOG.messageValidationFailed,
        message: `Message validation failed: ${kind.reason}`,
        actions: [dismiss],
      };
    case "conversationLoadFailed":
      return {
        entry: ERROR_CATALOG.conversationLoadFailed,
        message: "Failed to load conversation. The data may be corrupted.",
        actions: [retry, clearCache, dismiss],
      };
    case "conversationSaveFailed":
      return {
        entry: ERROR_CATALOG.conversationSaveFailed,
        message: "Failed to save conversation. Please check storage space.",
        actions: [retry, clearCache, dismiss],
      };
    case "inferenceTimeout":
      return {
        entry: ERROR_CATALOG.inferenceTimeout,
        message: "The AI response took too long to generate. Please try again.",
        actions: [retry, switchFallbackModel, dismiss],
      };
    case "inferenceFailed":
      return {
        entry: ERROR_CATALOG.inferenceFailed,
        message: "Failed to generate AI response. Please try again.",
        actions: [retry, switchFallbackModel, dismiss],
      };

    case "exportFailed":
      return {
        entry: ERROR_CATALOG.exportFailed,
        message: `Failed to export conversation as ${kind.format}. Please try again.`,
        actions: [retry, checkStorage, dismiss],
      };
    case "exportFormatUnsupported":
      return {
        entry: ERROR_CATALOG.exportFormatUnsupported,
        message: `Export format '${kind.format}' is not supported.`,
        actions: [dismiss],
      };
    case "exportPermissionDenied":
      return {
        entry: ERROR_CATALOG.exportPermissionDenied,
        message: "Permission denied for exporting files. Please check app permissions.",
        actions: [openSettings, dismiss],
      };

    case "systemResourcesUnavailable":
      return {
        entry: ERROR_CATALOG.systemResourcesUnavailable,
        message: "System resources are unavailable. Please restart the app.",
        actions: [restartApp, contactSupport, dismiss],
      };
    case "permissionDenied":
      return {
        entry: ERROR_CATALOG.permissionDenied,
        message: `Permission denied for ${kind.permission}. Please check app settings.`,
        actions: [openSettings, dismiss],
      };
    case "configurationError":
      return {
        entry: ERROR_CATALOG.configurationError,
        message: `Configuration error: ${kind.details}`,
        actions: [restartApp, contactSupport, dismiss],
      };
    case "unexpectedError":
      return {
        entry: ERROR_CATALOG.unexpectedError,
        message: "An unexpected error occurred. Please try again.",
        actions: [restartApp, contactSupport, dismiss],
      };

    case "invalidInput":
      return {
        entry: ERROR_CATALOG.invalidInput,
        message: `Invalid input: ${kind.details}`,
        actions: [dismiss],
      };
    case "operationCancelled":
      return {
        entry: ERROR_CATALOG.operationCancelled,
        message: "Operation was cancelled.",
        actions: [dismiss],
      };
    case "featureNotAvailable":
      return {
        entry: ERROR_CATALOG.featureNotAvailable,
        message: `The feature '${kind.feature}' is not available on this device.`,
        actions: [dismiss],
      };

    default: {
      // Unreachable for well-typed input; values crossing a process
      // boundary can still carry a tag this build does not know.
      const unknownKind: never = kind;
      void unknownKind;
      return {
        entry: UNCATEGORIZED_ENTRY,
        message: "An unrecognized error occurred.",
        actions: [dismiss],
      };
    }
  }
}

/**
 * Derive code, category, severity, retryability, user message and the
 * ordered recovery actions for an error kind.
 */
export function classify(kind: ErrorKind): ErrorClassification {
  const { entry, message, actions } = derive(kind);
  return {
    code: entry.code,
    category: entry.category,
    severity: entry.severity,
    retryable: entry.retryable,
    message,
    recoveryActions: actions,
  };
}
