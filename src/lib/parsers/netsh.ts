import type { DiscoveredNetwork } from '../../types.js';
import { parseSignalLevel, splitLines, tokenize } from './common.js';

interface PendingAccessPoint {
  mac: string;
  signal: string;
}

interface NetworkBlock {
  network: DiscoveredNetwork;
  bestSignal: number | null;
}

function emptyBlock(): NetworkBlock {
  return {
    network: {
      ssid: '',
      mac: '',
      channel: '',
      signalLevel: '0',
      security: '',
      inUse: false,
    },
    bestSignal: null,
  };
}

/**
 * Parses `netsh wlan show networks mode=bssid`.
 *
 * Each SSID is a blank-line terminated block that may list several access
 * points; the strongest one (first seen on ties) supplies mac, channel and
 * signal level:
 *
 *   SSID 1 : Office
 *       Network type            : Infrastructure
 *       Authentication          : WPA2-Personal
 *       Encryption              : CCMP
 *       BSSID 1                 : 11:22:33:44:55:66
 *            Signal             : 72%
 *            Radio type         : 802.11ac
 *            Channel            : 10
 *
 * Blocks that never report a BSSID are dropped.
 */
export function parseNetshScan(output: string): DiscoveredNetwork[] {
  const networks: DiscoveredNetwork[] = [];
  let block = emptyBlock();
  let pending: PendingAccessPoint = { mac: '', signal: '0' };

  const flush = (): void => {
    if (block.network.mac !== '') {
      networks.push(block.network);
    }
    block = emptyBlock();
    pending = { mac: '', signal: '0' };
  };

  for (const line of splitLines(output)) {
    const parts = tokenize(line);
    if (parts.length === 0) {
      flush();
      continue;
    }

    switch (parts[0]) {
      case 'SSID': // SSID 1 : Office
        block.network.ssid = valueAfterColon(line);
        break;
      case 'Authentication': // Authentication : WPA2-Personal
        block.network.security = parts[2] ?? '';
        break;
      case 'BSSID': // BSSID 1 : 11:22:33:44:55:66
        pending.mac = parts[3] ?? '';
        break;
      case 'Signal': { // Signal : 72%
        const raw = parts[2];
        pending.signal = raw === undefined ? '0' : raw.replace(/%$/, '');
        break;
      }
      case 'Channel': // Channel : 10
        commitAccessPoint(block, pending, parts[2] ?? '');
        break;
      default:
        // Interface, There, Network type, Encryption, Radio type, rates
        break;
    }
  }

  flush();
  return networks;
}

function commitAccessPoint(
  block: NetworkBlock,
  pending: PendingAccessPoint,
  channel: string
): void {
  const signal = parseSignalLevel(pending.signal);
  if (signal === null) {
    console.warn('Skipping access point with non-numeric signal', {
      ssid: block.network.ssid,
      mac: pending.mac,
      signal: pending.signal,
    });
    return;
  }

  if (block.bestSignal === null || block.network.mac === '' || signal > block.bestSignal) {
    block.bestSignal = signal;
    block.network.mac = pending.mac;
    block.network.signalLevel = String(signal);
    block.network.channel = channel;
  }
}

function valueAfterColon(line: string): string {
  const idx = line.indexOf(':');
  return idx >= 0 ? line.substring(idx + 1).trim() : '';
}
