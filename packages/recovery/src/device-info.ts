import * as os from "node:os";

/** Host description attached to critical log lines and support requests */
export interface DeviceInfo {
  readonly model: string;
  readonly osVersion: string;
  readonly appVersion: string;
  readonly processorCount?: number;
  readonly totalMemoryBytes?: number;
  readonly freeMemoryBytes?: number;
}

export interface DeviceInfoProvider {
  collect(): DeviceInfo;
}

/** Reads the host through node:os on every call */
export function createNodeDeviceInfoProvider(appVersion: string): DeviceInfoProvider {
  return {
    collect: () => ({
      model: `${os.type()} ${os.machine()}`,
      osVersion: `${os.platform()} ${os.release()}`,
      appVersion,
      processorCount: os.cpus().length,
      totalMemoryBytes: os.totalmem(),
      freeMemoryBytes: os.freemem(),
    }),
  };
}

/** Human-readable byte count in binary units: "512 B", "1.5 KB", "7.8 GB" */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${units[unit]}`;
}

/**
 * One-line summary used by SYSTEM_INFO log entries. Model and OS version are
 * left out: only critical entries carry them.
 */
export function formatSystemInfo(device: DeviceInfo): string {
  const parts = [`App: ${device.appVersion}`];
  if (device.processorCount !== undefined) {
    parts.push(`CPU Cores: ${device.processorCount}`);
  }
  if (device.totalMemoryBytes !== undefined) {
    const free =
      device.freeMemoryBytes === undefined ? "?" : formatBytes(device.freeMemoryBytes);
    parts.push(`Memory: ${free} free / ${formatBytes(device.totalMemoryBytes)}`);
  }
  return parts.join(" | ");
}
