import { describe, it, expect } from 'vitest';
import { NetworkManagerBackend } from '../../src/lib/backends/network-manager.js';
import { NetshBackend } from '../../src/lib/backends/netsh.js';
import { WifiError, WifiErrorCode } from '../../src/lib/errors.js';
import { FakeExecutor } from '../helpers/fake-executor.js';

describe('NetworkManagerBackend', () => {
  it('should pass ssid, password and interface to nmcli connect', async () => {
    const executor = new FakeExecutor().on(
      'nmcli d wifi connect',
      "Device 'wlan0' successfully activated with 'c0ffee00-0000-4000-8000-000000000001'.\n"
    );
    const backend = new NetworkManagerBackend(executor);

    await expect(backend.connect('wlan0', 'HomeNet', 'test-secret')).resolves.toBe(true);
    expect(executor.calls).toEqual([
      {
        command: 'nmcli',
        args: ['d', 'wifi', 'connect', 'HomeNet', 'password', 'test-secret', 'ifname', 'wlan0'],
      },
    ]);
  });

  it('should resolve false when the activation marker is missing', async () => {
    const executor = new FakeExecutor().on(
      'nmcli d wifi connect',
      'Error: Connection activation failed: Secrets were required, but not provided.\n'
    );
    const backend = new NetworkManagerBackend(executor);

    await expect(backend.connect('wlan0', 'HomeNet', 'wrong')).resolves.toBe(false);
  });

  it('should match the marker case-sensitively', async () => {
    const executor = new FakeExecutor().on('nmcli d wifi connect', 'SUCCESSFULLY ACTIVATED');
    const backend = new NetworkManagerBackend(executor);

    await expect(backend.connect('wlan0', 'HomeNet', 'test-secret')).resolves.toBe(false);
  });

  it('should raise CONNECT_EXECUTION_FAILED when nmcli cannot run', async () => {
    const backend = new NetworkManagerBackend(new FakeExecutor());

    const attempt = backend.connect('wlan0', 'HomeNet', 'test-secret');

    await expect(attempt).rejects.toBeInstanceOf(WifiError);
    await expect(attempt).rejects.toMatchObject({
      code: WifiErrorCode.CONNECT_EXECUTION_FAILED,
      message: 'connect failed: Failed to run nmcli: spawn nmcli ENOENT',
    });
  });

  it('should disconnect the named interface', async () => {
    const executor = new FakeExecutor().on(
      'nmcli d disconnect',
      "Device 'wlan0' successfully disconnected.\n"
    );
    const backend = new NetworkManagerBackend(executor);

    await expect(backend.disconnect('wlan0')).resolves.toBe(true);
    expect(executor.commandLines()).toEqual(['nmcli d disconnect ifname wlan0']);
  });

  it('should raise DISCONNECT_EXECUTION_FAILED when nmcli cannot run', async () => {
    const backend = new NetworkManagerBackend(new FakeExecutor());

    await expect(backend.disconnect('wlan0')).rejects.toMatchObject({
      code: WifiErrorCode.DISCONNECT_EXECUTION_FAILED,
    });
  });

  it('should scan with the fixed field list', async () => {
    const executor = new FakeExecutor().on(
      'nmcli -f',
      'IN-USE  BSSID              SSID     CHAN  SIGNAL  SECURITY\n*       AA:BB:CC:DD:EE:FF  HomeNet  6     80      WPA2\n'
    );
    const backend = new NetworkManagerBackend(executor, '/usr/bin/nmcli');

    const networks = await backend.scan('wlan0');

    expect(executor.commandLines()).toEqual([
      '/usr/bin/nmcli -f IN-USE,BSSID,SSID,CHAN,SIGNAL,SECURITY d wifi list',
    ]);
    expect(networks).toEqual([
      {
        ssid: 'HomeNet',
        mac: 'AA:BB:CC:DD:EE:FF',
        channel: '6',
        signalLevel: '80',
        security: 'WPA2',
        inUse: true,
      },
    ]);
  });

  it('should raise SCAN_EXECUTION_FAILED wrapping the cause', async () => {
    const backend = new NetworkManagerBackend(
      new FakeExecutor().on('nmcli', new Error('spawn nmcli EACCES'))
    );

    await expect(backend.scan('wlan0')).rejects.toMatchObject({
      code: WifiErrorCode.SCAN_EXECUTION_FAILED,
      message: 'scan failed: Failed to run nmcli: spawn nmcli EACCES',
      context: { operation: 'scan', command: 'nmcli' },
    });
  });

  it('should read radio state from nmcli radio wifi', async () => {
    const enabled = new NetworkManagerBackend(new FakeExecutor().on('nmcli radio wifi', 'enabled\n'));
    const disabled = new NetworkManagerBackend(new FakeExecutor().on('nmcli radio wifi', 'disabled\n'));

    await expect(enabled.isEnabled()).resolves.toBe(true);
    await expect(disabled.isEnabled()).resolves.toBe(false);
  });
});

describe('NetshBackend', () => {
  it('should add a profile before connecting by name', async () => {
    const executor = new FakeExecutor()
      .on('netsh wlan add profile', 'Profile Office is added on interface Wi-Fi.\r\n')
      .on('netsh wlan connect', 'Connection request was completed successfully.\r\n');
    const backend = new NetshBackend(executor);

    await expect(backend.connect('Wi-Fi', 'Office', 'test-secret')).resolves.toBe(true);

    const lines = executor.commandLines();
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^netsh wlan add profile filename=.+profile\.xml$/);
    expect(lines[1]).toBe('netsh wlan connect name=Office');
  });

  it('should resolve false when the connect marker is missing', async () => {
    const executor = new FakeExecutor()
      .on('netsh wlan add profile', 'Profile Office is added on interface Wi-Fi.\r\n')
      .on('netsh wlan connect', 'There is no profile "Office" assigned to the specified interface.\r\n');
    const backend = new NetshBackend(executor);

    await expect(backend.connect('Wi-Fi', 'Office', 'test-secret')).resolves.toBe(false);
  });

  it('should not connect when the profile cannot be added', async () => {
    const executor = new FakeExecutor()
      .on('netsh wlan add profile', new Error('spawn netsh ENOENT'))
      .on('netsh wlan connect', 'Connection request was completed successfully.\r\n');
    const backend = new NetshBackend(executor);

    await expect(backend.connect('Wi-Fi', 'Office', 'test-secret')).rejects.toMatchObject({
      code: WifiErrorCode.PROFILE_CREATION_FAILED,
    });
    expect(executor.commandLines().some((line) => line.startsWith('netsh wlan connect'))).toBe(false);
  });

  it('should raise CONNECT_EXECUTION_FAILED when the join cannot run', async () => {
    const executor = new FakeExecutor()
      .on('netsh wlan add profile', 'Profile Office is added on interface Wi-Fi.\r\n')
      .on('netsh wlan connect', new Error('spawn netsh EPERM'));
    const backend = new NetshBackend(executor);

    await expect(backend.connect('Wi-Fi', 'Office', 'test-secret')).rejects.toMatchObject({
      code: WifiErrorCode.CONNECT_EXECUTION_FAILED,
    });
  });

  it('should disconnect with netsh wlan disconnect', async () => {
    const executor = new FakeExecutor().on(
      'netsh wlan disconnect',
      'Disconnection request was completed successfully for interface "Wi-Fi".\r\n'
    );
    const backend = new NetshBackend(executor);

    // The marker is case-sensitive and "Disconnection" does not contain it
    await expect(backend.disconnect('Wi-Fi')).resolves.toBe(false);
    expect(executor.commandLines()).toEqual(['netsh wlan disconnect']);
  });

  it('should report disconnected when the output mentions disconnect', async () => {
    const executor = new FakeExecutor().on(
      'netsh wlan disconnect',
      'Wi-Fi interface was asked to disconnect.\r\n'
    );
    const backend = new NetshBackend(executor);

    await expect(backend.disconnect('Wi-Fi')).resolves.toBe(true);
  });

  it('should scan with mode=bssid', async () => {
    const executor = new FakeExecutor().on(
      'netsh wlan show networks',
      'SSID 1 : Office\r\n    Authentication : WPA2-Personal\r\n    BSSID 1 : 11:22:33:44:55:66\r\n         Signal : 72%\r\n         Channel : 10\r\n\r\n'
    );
    const backend = new NetshBackend(executor);

    const networks = await backend.scan('Wi-Fi');

    expect(executor.commandLines()).toEqual(['netsh wlan show networks mode=bssid']);
    expect(networks).toEqual([
      {
        ssid: 'Office',
        mac: '11:22:33:44:55:66',
        channel: '10',
        signalLevel: '72',
        security: 'WPA2-Personal',
        inUse: false,
      },
    ]);
  });

  it('should treat a system without a wireless interface as radio off', async () => {
    const none = new NetshBackend(
      new FakeExecutor().on('netsh wlan show interfaces', 'There is no wireless interface on the system.\r\n')
    );
    const present = new NetshBackend(
      new FakeExecutor().on(
        'netsh wlan show interfaces',
        'There is 1 interface on the system: \r\n\r\n    Name                   : Wi-Fi\r\n'
      )
    );

    await expect(none.isEnabled()).resolves.toBe(false);
    await expect(present.isEnabled()).resolves.toBe(true);
  });
});
