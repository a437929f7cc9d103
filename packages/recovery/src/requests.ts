/**
 * RecoveryRequestBus - one-way requests to the host application
 *
 * The coordinator does not implement destructive or external recovery
 * effects (clearing caches, restarting, navigating). It emits a request and
 * moves on; whoever owns the effect listens here. Nothing is awaited.
 *
 * A listener that throws is reported to the fallback channel and stops the
 * remaining listeners for that request (EventEmitter semantics).
 */

import { EventEmitter } from "node:events";
import { describeThrown, logWarn } from "@lumen/core";

const TAG = "@lumen/recovery";

export interface RecoveryRequestEvents {
  redownloadModel: [{ modelName: string }];
  clearCache: [];
  freeMemory: [];
  restart: [];
  navigateToStorage: [];
  contactSupport: [{ diagnosticText: string }];
  switchFallbackModel: [];
  openSettings: [{ section?: string }];
}

export type RecoveryRequestName = keyof RecoveryRequestEvents;

export class RecoveryRequestBus extends EventEmitter<RecoveryRequestEvents> {
  requestRedownload(modelName: string): void {
    this.send("redownloadModel", () => this.emit("redownloadModel", { modelName }));
  }

  requestClearCache(): void {
    this.send("clearCache", () => this.emit("clearCache"));
  }

  requestFreeMemory(): void {
    this.send("freeMemory", () => this.emit("freeMemory"));
  }

  requestRestart(): void {
    this.send("restart", () => this.emit("restart"));
  }

  requestNavigateToStorage(): void {
    this.send("navigateToStorage", () => this.emit("navigateToStorage"));
  }

  requestContactSupport(diagnosticText: string): void {
    this.send("contactSupport", () => this.emit("contactSupport", { diagnosticText }));
  }

  requestSwitchFallbackModel(): void {
    this.send("switchFallbackModel", () => this.emit("switchFallbackModel"));
  }

  requestOpenSettings(section?: string): void {
    this.send("openSettings", () =>
      this.emit("openSettings", section === undefined ? {} : { section }),
    );
  }

  private send(name: RecoveryRequestName, emit: () => boolean): void {
    try {
      emit();
    } catch (error) {
      logWarn(TAG, `'${name}' listener failed: ${describeThrown(error)}`);
    }
  }
}
