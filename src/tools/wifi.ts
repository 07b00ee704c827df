import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { getErrorCode } from '../lib/errors.js';
import type { InterfaceRegistry } from '../lib/wireless-interface.js';

function errorResult(error: unknown) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify({
          success: false,
          error: error instanceof Error ? error.message : String(error),
          code: getErrorCode(error), // omitted by JSON.stringify when undefined
        }),
      },
    ],
    isError: true,
  };
}

export function registerWifiTools(
  server: McpServer,
  registry: InterfaceRegistry,
  defaultInterface: string
): void {
  // wifi_scan - Scan for available networks
  server.tool(
    'wifi_scan',
    'Scan for available WiFi networks. Returns nearby access points with SSID, BSSID (mac), channel, signal level (percent), security label, and inUse=true for the network currently joined. An SSID broadcast by several access points on Windows is reported once, with its strongest access point.',
    {
      interface: z
        .string()
        .optional()
        .describe(`WiFi interface name (default: ${defaultInterface})`),
    },
    async ({ interface: iface }) => {
      try {
        const wifi = registry.get(iface || defaultInterface);
        const networks = await wifi.scan();

        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify(
                {
                  success: true,
                  interface: wifi.name,
                  networks: networks,
                  count: networks.length,
                },
                null,
                2
              ),
            },
          ],
        };
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // wifi_connect - Connect to a network
  server.tool(
    'wifi_connect',
    'Connect to a WPA2-PSK WiFi network. Fails with RADIO_DISABLED (1001) when the WiFi radio is off. connected=false means the system tool ran but did not report the network as activated (wrong password, network out of range).',
    {
      ssid: z.string().min(1).describe('Network SSID to connect to'),
      password: z.string().describe('Network password'),
      interface: z
        .string()
        .optional()
        .describe(`WiFi interface name (default: ${defaultInterface})`),
    },
    async ({ ssid, password, interface: iface }) => {
      try {
        const wifi = registry.get(iface || defaultInterface);
        const connected = await wifi.connect(ssid, password);

        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify(
                {
                  success: true,
                  connected,
                  message: connected
                    ? `Connected to ${ssid}`
                    : `Connection to ${ssid} was not activated`,
                  connection: wifi.getConnection(),
                },
                null,
                2
              ),
            },
          ],
        };
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // wifi_disconnect - Disconnect from current network
  server.tool(
    'wifi_disconnect',
    'Disconnect the interface from its current WiFi network. Use before connecting to a different network.',
    {
      interface: z
        .string()
        .optional()
        .describe(`WiFi interface name (default: ${defaultInterface})`),
    },
    async ({ interface: iface }) => {
      try {
        const wifi = registry.get(iface || defaultInterface);
        const disconnected = await wifi.disconnect();

        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify({
                success: true,
                disconnected,
                message: disconnected
                  ? 'Disconnected from WiFi'
                  : 'Disconnect was not confirmed',
                connection: wifi.getConnection(),
              }),
            },
          ],
        };
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // wifi_status - Get current connection status
  server.tool(
    'wifi_status',
    'Get WiFi status for an interface: backend platform (network-manager or netsh), whether the radio is enabled, and the network joined through wifi_connect (null when not connected).',
    {
      interface: z
        .string()
        .optional()
        .describe(`WiFi interface name (default: ${defaultInterface})`),
    },
    async ({ interface: iface }) => {
      try {
        const wifi = registry.get(iface || defaultInterface);
        const radioEnabled = await wifi.isRadioEnabled();

        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify(
                {
                  success: true,
                  interface: wifi.name,
                  platform: wifi.platform,
                  radioEnabled,
                  connection: wifi.getConnection(),
                },
                null,
                2
              ),
            },
          ],
        };
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
