import type { DiscoveredNetwork, ProcessExecutor, WifiBackend } from '../../types.js';
import { WifiErrorCode, executionFailure } from '../errors.js';
import { parseNmcliScan } from '../parsers/nmcli.js';

const CONNECTED_MARKER = 'successfully activated';
const DISCONNECTED_MARKER = 'disconnect';

export const NMCLI_SCAN_FIELDS = 'IN-USE,BSSID,SSID,CHAN,SIGNAL,SECURITY';

/**
 * Linux backend over NetworkManager's nmcli.
 */
export class NetworkManagerBackend implements WifiBackend {
  readonly platform = 'network-manager' as const;

  constructor(
    private executor: ProcessExecutor,
    private nmcli: string = 'nmcli'
  ) {}

  async isEnabled(): Promise<boolean> {
    const output = await this.executor.run(this.nmcli, ['radio', 'wifi']);
    return output.trim() === 'enabled';
  }

  async connect(iface: string, ssid: string, password: string): Promise<boolean> {
    let output: string;
    try {
      output = await this.executor.run(this.nmcli, [
        'd',
        'wifi',
        'connect',
        ssid,
        'password',
        password,
        'ifname',
        iface,
      ]);
    } catch (error) {
      throw executionFailure(WifiErrorCode.CONNECT_EXECUTION_FAILED, 'connect', error);
    }

    return output.includes(CONNECTED_MARKER);
  }

  async disconnect(iface: string): Promise<boolean> {
    let output: string;
    try {
      output = await this.executor.run(this.nmcli, ['d', 'disconnect', 'ifname', iface]);
    } catch (error) {
      throw executionFailure(WifiErrorCode.DISCONNECT_EXECUTION_FAILED, 'disconnect', error);
    }

    return output.includes(DISCONNECTED_MARKER);
  }

  // nmcli lists networks seen by every adapter; the interface is not passed
  async scan(_iface: string): Promise<DiscoveredNetwork[]> {
    let output: string;
    try {
      output = await this.executor.run(this.nmcli, [
        '-f',
        NMCLI_SCAN_FIELDS,
        'd',
        'wifi',
        'list',
      ]);
    } catch (error) {
      throw executionFailure(WifiErrorCode.SCAN_EXECUTION_FAILED, 'scan', error);
    }

    return parseNmcliScan(output);
  }
}
