import type { DiscoveredNetwork, ProcessExecutor, WifiBackend } from '../../types.js';
import { WifiErrorCode, executionFailure } from '../errors.js';
import { parseNetshScan } from '../parsers/netsh.js';
import { addWlanProfile } from '../wlan-profile.js';

const CONNECTED_MARKER = 'completed successfully';
const DISCONNECTED_MARKER = 'disconnect';
const NO_INTERFACE_MESSAGE = 'There is no wireless interface on the system.';

/**
 * Windows backend over `netsh wlan`. Networks are joined by profile name,
 * so connect registers a profile for the SSID first.
 */
export class NetshBackend implements WifiBackend {
  readonly platform = 'netsh' as const;

  constructor(
    private executor: ProcessExecutor,
    private netsh: string = 'netsh'
  ) {}

  async isEnabled(): Promise<boolean> {
    const output = await this.executor.run(this.netsh, ['wlan', 'show', 'interfaces']);
    return !output.includes(NO_INTERFACE_MESSAGE);
  }

  async connect(_iface: string, ssid: string, password: string): Promise<boolean> {
    await addWlanProfile(this.executor, this.netsh, ssid, password);

    let output: string;
    try {
      output = await this.executor.run(this.netsh, ['wlan', 'connect', `name=${ssid}`]);
    } catch (error) {
      throw executionFailure(WifiErrorCode.CONNECT_EXECUTION_FAILED, 'connect', error);
    }

    return output.includes(CONNECTED_MARKER);
  }

  async disconnect(_iface: string): Promise<boolean> {
    let output: string;
    try {
      output = await this.executor.run(this.netsh, ['wlan', 'disconnect']);
    } catch (error) {
      throw executionFailure(WifiErrorCode.DISCONNECT_EXECUTION_FAILED, 'disconnect', error);
    }

    return output.includes(DISCONNECTED_MARKER);
  }

  async scan(_iface: string): Promise<DiscoveredNetwork[]> {
    let output: string;
    try {
      output = await this.executor.run(this.netsh, ['wlan', 'show', 'networks', 'mode=bssid']);
    } catch (error) {
      throw executionFailure(WifiErrorCode.SCAN_EXECUTION_FAILED, 'scan', error);
    }

    return parseNetshScan(output);
  }
}
