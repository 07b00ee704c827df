import type { PlatformFamily, PlatformSetting, ProcessExecutor, WifiBackend } from '../types.js';
import { WifiError, WifiErrorCode } from './errors.js';
import { NetworkManagerBackend } from './backends/network-manager.js';
import { NetshBackend } from './backends/netsh.js';

export interface BackendOptions {
  platform: PlatformSetting;
  nmcliPath: string;
  netshPath: string;
}

export function detectPlatform(hostPlatform: NodeJS.Platform): PlatformFamily {
  switch (hostPlatform) {
    case 'linux':
      return 'network-manager';
    case 'win32':
      return 'netsh';
    default:
      throw new WifiError(
        WifiErrorCode.UNSUPPORTED_PLATFORM,
        `No WiFi backend for platform ${hostPlatform}`,
        { context: { platform: hostPlatform } }
      );
  }
}

export function createBackend(
  executor: ProcessExecutor,
  options: BackendOptions,
  hostPlatform: NodeJS.Platform = process.platform
): WifiBackend {
  const family =
    options.platform === 'auto' ? detectPlatform(hostPlatform) : options.platform;

  switch (family) {
    case 'network-manager':
      return new NetworkManagerBackend(executor, options.nmcliPath);
    case 'netsh':
      return new NetshBackend(executor, options.netshPath);
  }
}
