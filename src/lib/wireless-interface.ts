import type { ActiveConnection, DiscoveredNetwork, WifiBackend } from '../types.js';
import { WifiError, WifiErrorCode } from './errors.js';

/**
 * A named radio adapter and the network it is currently joined to.
 *
 * Calls are not serialized; callers that may overlap operations on one
 * interface must queue them.
 */
export class WirelessInterface {
  private connection: ActiveConnection | null = null;

  constructor(
    readonly name: string,
    private backend: WifiBackend
  ) {}

  get platform(): WifiBackend['platform'] {
    return this.backend.platform;
  }

  getConnection(): Readonly<ActiveConnection> | null {
    return this.connection && { ...this.connection };
  }

  async isRadioEnabled(): Promise<boolean> {
    try {
      return await this.backend.isEnabled();
    } catch (error) {
      throw new WifiError(
        WifiErrorCode.RADIO_STATE_UNAVAILABLE,
        `Could not read radio state for ${this.name}`,
        { cause: error instanceof Error ? error : undefined, context: { interface: this.name } }
      );
    }
  }

  /**
   * Joins `ssid`. Resolves false when the tool ran but did not report
   * success; the recorded connection only changes on true.
   */
  async connect(ssid: string, password: string): Promise<boolean> {
    if (!ssid) {
      throw new WifiError(WifiErrorCode.INVALID_PARAMETER, 'SSID must not be empty', {
        context: { interface: this.name },
      });
    }

    if (!(await this.isRadioEnabled())) {
      throw new WifiError(WifiErrorCode.RADIO_DISABLED, `WiFi radio is disabled on ${this.name}`, {
        context: { interface: this.name },
      });
    }

    console.log(`Connecting ${this.name} to ${ssid}...`);
    const connected = await this.backend.connect(this.name, ssid, password);

    if (connected) {
      this.connection = { ssid, connectedAt: new Date().toISOString() };
      console.log(`Connected ${this.name} to ${ssid}`);
    } else {
      console.log(`Connection to ${ssid} was not activated`, { interface: this.name });
    }

    return connected;
  }

  async disconnect(): Promise<boolean> {
    console.log(`Disconnecting ${this.name}...`);
    const disconnected = await this.backend.disconnect(this.name);

    if (disconnected) {
      this.connection = null;
    }

    return disconnected;
  }

  async scan(): Promise<DiscoveredNetwork[]> {
    return this.backend.scan(this.name);
  }
}

/**
 * Keeps one WirelessInterface per adapter name so connection state
 * survives across requests.
 */
export class InterfaceRegistry {
  private interfaces = new Map<string, WirelessInterface>();

  constructor(private backend: WifiBackend) {}

  get(name: string): WirelessInterface {
    let wifi = this.interfaces.get(name);
    if (!wifi) {
      wifi = new WirelessInterface(name, this.backend);
      this.interfaces.set(name, wifi);
    }
    return wifi;
  }

  list(): WirelessInterface[] {
    return [...this.interfaces.values()];
  }
}
