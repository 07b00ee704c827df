import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import type { ProcessExecutor } from '../types.js';
import { WifiError, WifiErrorCode } from './errors.js';

const PROFILE_TEMPLATE = `<?xml version="1.0"?>
<WLANProfile xmlns="http://www.microsoft.com/networking/WLAN/profile/v1">
  <name>{SSID}</name>
  <SSIDConfig>
    <SSID>
      <name>{SSID}</name>
    </SSID>
  </SSIDConfig>
  <connectionType>ESS</connectionType>
  <connectionMode>auto</connectionMode>
  <MSM>
    <security>
      <authEncryption>
        <authentication>WPA2PSK</authentication>
        <encryption>AES</encryption>
        <useOneX>false</useOneX>
      </authEncryption>
      <sharedKey>
        <keyType>passPhrase</keyType>
        <protected>false</protected>
        <keyMaterial>{password}</keyMaterial>
      </sharedKey>
    </security>
  </MSM>
</WLANProfile>
`;

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

/**
 * Renders the WPA2-PSK profile document netsh needs before it can join a
 * network by name.
 */
export function renderWlanProfile(ssid: string, password: string): string {
  return PROFILE_TEMPLATE
    .replaceAll('{SSID}', escapeXml(ssid))
    .replaceAll('{password}', escapeXml(password));
}

/**
 * Writes the profile to a private temp directory, registers it with
 * `netsh wlan add profile` and removes the file again.
 */
export async function addWlanProfile(
  executor: ProcessExecutor,
  netsh: string,
  ssid: string,
  password: string
): Promise<void> {
  let dir: string | undefined;

  try {
    dir = await mkdtemp(join(tmpdir(), 'wifi-profile-'));
    const profilePath = join(dir, 'profile.xml');
    await writeFile(profilePath, renderWlanProfile(ssid, password), { mode: 0o600 });

    await executor.run(netsh, ['wlan', 'add', 'profile', `filename=${profilePath}`]);
  } catch (error) {
    throw new WifiError(
      WifiErrorCode.PROFILE_CREATION_FAILED,
      `Failed to add WLAN profile for ${ssid}`,
      {
        cause: error instanceof Error ? error : undefined,
        context: { ssid },
      }
    );
  } finally {
    if (dir) {
      await rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
        console.error('Failed to remove WLAN profile file:', error);
      });
    }
  }
}
