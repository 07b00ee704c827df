import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv } from '../../src/config.js';
import { WifiError, WifiErrorCode } from '../../src/lib/errors.js';
import { captureError } from '../helpers/capture-error.js';

describe('loadConfigFromEnv', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual({
      server: { host: '0.0.0.0', port: 3000 },
      wifi: {
        interface: 'wlan0',
        platform: 'auto',
        nmcliPath: 'nmcli',
        netshPath: 'netsh',
      },
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfigFromEnv({
      HOST: '127.0.0.1',
      PORT: '8080',
      WIFI_INTERFACE: 'Wi-Fi',
      WIFI_PLATFORM: 'netsh',
      NETSH_PATH: 'C:\\Windows\\System32\\netsh.exe',
    });

    expect(config.server).toEqual({ host: '127.0.0.1', port: 8080 });
    expect(config.wifi.interface).toBe('Wi-Fi');
    expect(config.wifi.platform).toBe('netsh');
    expect(config.wifi.netshPath).toBe('C:\\Windows\\System32\\netsh.exe');
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfigFromEnv({ WIFI_INTERFACE: '', PORT: '' }).wifi.interface).toBe('wlan0');
  });

  it('should reject an invalid port', () => {
    const error = captureError(() => loadConfigFromEnv({ PORT: '70000' }));

    expect(error).toBeInstanceOf(WifiError);
    expect(error).toMatchObject({ code: WifiErrorCode.CONFIG_INVALID });
  });

  it('should reject an unknown platform', () => {
    expect(() => loadConfigFromEnv({ WIFI_PLATFORM: 'iwd' })).toThrowError(/wifi\.platform/);
  });
});
