// WiFi Types
export interface DiscoveredNetwork {
  ssid: string;
  mac: string; // BSSID of the access point
  channel: string;
  signalLevel: string; // Percentage on nmcli and netsh
  security: string;
  inUse: boolean;
}

export interface ActiveConnection {
  ssid: string;
  connectedAt: string; // ISO-8601
}

// Backend Types
export type PlatformFamily =
  | 'network-manager' // Linux, driven through nmcli
  | 'netsh';          // Windows, driven through netsh wlan

export type PlatformSetting = PlatformFamily | 'auto';

export interface RadioStateGate {
  isEnabled(): Promise<boolean>;
}

/**
 * One variant per OS family. Every method runs a single external command
 * (a netsh connect also registers a profile first).
 */
export interface WifiBackend extends RadioStateGate {
  readonly platform: PlatformFamily;
  connect(iface: string, ssid: string, password: string): Promise<boolean>;
  disconnect(iface: string): Promise<boolean>;
  scan(iface: string): Promise<DiscoveredNetwork[]>;
}

// Process Types
export interface ProcessExecutor {
  run(command: string, args: readonly string[]): Promise<string>;
}
