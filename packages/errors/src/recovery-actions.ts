/**
 * Recovery actions offered to the user (or chosen by policy) for an error.
 *
 * Actions are plain immutable values; titles and descriptions are derived.
 */

export type RecoveryAction =
  | { readonly type: "retry" }
  | { readonly type: "retryWithDelay"; readonly seconds: number }
  | { readonly type: "redownloadModel"; readonly modelName: string }
  | { readonly type: "clearCache" }
  | { readonly type: "freeMemory" }
  | { readonly type: "restartApp" }
  | { readonly type: "checkNetwork" }
  | { readonly type: "checkStorage" }
  | { readonly type: "contactSupport" }
  | { readonly type: "dismiss" }
  | { readonly type: "openSettings" }
  | { readonly type: "switchFallbackModel" };

export type RecoveryActionType = RecoveryAction["type"];

export const RecoveryActions = {
  retry: { type: "retry" },
  retryWithDelay: (seconds: number): RecoveryAction => ({ type: "retryWithDelay", seconds }),
  redownloadModel: (modelName: string): RecoveryAction => ({ type: "redownloadModel", modelName }),
  clearCache: { type: "clearCache" },
  freeMemory: { type: "freeMemory" },
  restartApp: { type: "restartApp" },
  checkNetwork: { type: "checkNetwork" },
  checkStorage: { type: "checkStorage" },
  contactSupport: { type: "contactSupport" },
  dismiss: { type: "dismiss" },
  openSettings: { type: "openSettings" },
  switchFallbackModel: { type: "switchFallbackModel" },
} as const;

export function actionTitle(action: RecoveryAction): string {
  switch (action.type) {
    case "retry":
      return "Try Again";
    case "retryWithDelay":
      return "Retry";
    case "redownloadModel":
      return "Redownload Model";
    case "clearCache":
      return "Clear Cache";
    case "freeMemory":
      return "Free Memory";
    case "restartApp":
      return "Restart App";
    case "checkNetwork":
      return "Check Network";
    case "checkStorage":
      return "Check Storage";
    case "contactSupport":
      return "Contact Support";
    case "dismiss":
      return "Dismiss";
    case "openSettings":
      return "Open Settings";
    case "switchFallbackModel":
      return "Use Different Model";
  }
}

export function actionDescription(action: RecoveryAction): string {
  switch (action.type) {
    case "retry":
      return "Try the operation again";
    case "retryWithDelay":
      return `Wait ${Math.trunc(action.seconds)} seconds and try again`;
    case "redownloadModel":
      return `Redownload the ${action.modelName} model`;
    case "clearCache":
      return "Clear temporary files and cache";
    case "freeMemory":
      return "Free up device memory";
    case "restartApp":
      return "Restart the application";
    case "checkNetwork":
      return "Check your internet connection";
    case "checkStorage":
      return "Free up device storage space";
    case "contactSupport":
      return "Contact technical support";
    case "dismiss":
      return "Dismiss this error";
    case "openSettings":
      return "Open app settings";
    case "switchFallbackModel":
      return "Switch to a different model";
  }
}

/** Structural equality; actions carry no identity beyond their payload. */
export function isSameAction(a: RecoveryAction, b: RecoveryAction): boolean {
  switch (a.type) {
    case "retryWithDelay":
      return b.type === "retryWithDelay" && a.seconds === b.seconds;
    case "redownloadModel":
      return b.type === "redownloadModel" && a.modelName === b.modelName;
    default:
      return a.type === b.type;
  }
}
