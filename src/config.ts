import { z } from 'zod';
import { WifiError, WifiErrorCode } from './lib/errors.js';

export const ConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.coerce.number().int().min(1).max(65535).default(3000),
  }),
  wifi: z.object({
    interface: z.string().min(1).default('wlan0'),
    platform: z.enum(['auto', 'network-manager', 'netsh']).default('auto'),
    nmcliPath: z.string().min(1).default('nmcli'),
    netshPath: z.string().min(1).default('netsh'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse({
    server: {
      host: env['HOST'] || undefined,
      port: env['PORT'] || undefined,
    },
    wifi: {
      interface: env['WIFI_INTERFACE'] || undefined,
      platform: env['WIFI_PLATFORM'] || undefined,
      nmcliPath: env['NMCLI_PATH'] || undefined,
      netshPath: env['NETSH_PATH'] || undefined,
    },
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new WifiError(WifiErrorCode.CONFIG_INVALID, `Invalid configuration: ${issues.join('; ')}`, {
      context: { issues },
    });
  }

  return result.data;
}
