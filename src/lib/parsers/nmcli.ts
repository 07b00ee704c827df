import type { DiscoveredNetwork } from '../../types.js';
import { parseSignalLevel, splitLines, tokenize } from './common.js';

const HEADER_TOKEN = 'IN-USE';
const IN_USE_MARKER = '*';

/**
 * Parses `nmcli -f IN-USE,BSSID,SSID,CHAN,SIGNAL,SECURITY d wifi list`.
 *
 * One network per line after the header:
 *
 *   IN-USE  BSSID              SSID      CHAN  SIGNAL  SECURITY
 *   *       AA:BB:CC:DD:EE:FF  HomeNet   6     80      WPA2
 *           11:22:33:44:55:66  Cafe      11    42      WPA1 WPA2
 *
 * A second security token replaces the first. Lines missing a column are
 * skipped.
 */
export function parseNmcliScan(output: string): DiscoveredNetwork[] {
  const networks: DiscoveredNetwork[] = [];
  const lines = splitLines(output).slice(1); // Skip header

  for (const line of lines) {
    const parts = tokenize(line);
    if (parts.length === 0) continue;
    if (parts[0] === HEADER_TOKEN) continue;

    const inUse = parts[0] === IN_USE_MARKER;
    const fields = inUse ? parts.slice(1) : parts;
    const [mac, ssid, channel, signal, primarySecurity, altSecurity] = fields;

    if (!mac || !ssid || !channel || !signal || !primarySecurity) {
      console.warn('Skipping malformed nmcli line', { line });
      continue;
    }

    const signalLevel = parseSignalLevel(signal);
    if (signalLevel === null) {
      console.warn('Skipping nmcli line with non-numeric signal', { line });
      continue;
    }

    networks.push({
      ssid,
      mac,
      channel,
      signalLevel: String(signalLevel),
      security: altSecurity || primarySecurity,
      inUse,
    });
  }

  return networks;
}
