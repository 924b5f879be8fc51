import { existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

/**
 * Bundle installations the installer knows about
 */
export const INSTALLATION_KINDS = ['system', 'user'] as const;
export type InstallationKind = (typeof INSTALLATION_KINDS)[number];

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Flatpak
  FLATPAK_BINARY: z.string().min(1).default('flatpak'),
  FLATPAK_INSTALLATIONS: z
    .string()
    .default('system,user')
    .refine(
      value => splitList(value).every(kind => (INSTALLATION_KINDS as readonly string[]).includes(kind)),
      'FLATPAK_INSTALLATIONS must be a comma-separated list of "system" and "user"'
    ),
  FLATPAK_USER_DIR: z.string().min(1).default(join(homedir(), '.local', 'share', 'flatpak')),
  FLATPAK_SYSTEM_DIR: z.string().min(1).default('/var/lib/flatpak'),
  FLATPAK_ARCH: z.string().min(1).optional(),
  HOST_COMMAND_PREFIX: z.string().optional(),

  // Voices
  VOICE_COMPONENT_MARKER: z.string().min(1).default('Speech.Provider.Voice'),
  REFRESH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DBUS_BUS: z.enum(['session', 'system']).default('session'),
});

/**
 * Validated environment type
 */
export type Environment = z.infer<typeof envSchema>;

function splitList(value: string): string[] {
  return value.split(',').map(part => part.trim()).filter(part => part.length > 0);
}

/**
 * Parse and validate environment variables
 */
function parseEnvironment(): Environment {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join('.')}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Validated environment variables
 */
export const env: Environment = parseEnvironment();

/**
 * Installations to scan, in catalog order (duplicates dropped)
 */
export function parseInstallations(value: string = env.FLATPAK_INSTALLATIONS): InstallationKind[] {
  const kinds: InstallationKind[] = [];
  for (const part of splitList(value)) {
    const kind = INSTALLATION_KINDS.find(k => k === part);
    if (kind && !kinds.includes(kind)) {
      kinds.push(kind);
    }
  }
  return kinds;
}

/**
 * Directory holding the given installation's deployments and appstream data
 */
export function installationDir(kind: InstallationKind): string {
  return kind === 'user' ? env.FLATPAK_USER_DIR : env.FLATPAK_SYSTEM_DIR;
}

/**
 * Flatpak architecture name for the running machine
 */
export function defaultArch(nodeArch: string = process.arch): string {
  if (env.FLATPAK_ARCH) return env.FLATPAK_ARCH;

  switch (nodeArch) {
    case 'x64':
      return 'x86_64';
    case 'arm64':
      return 'aarch64';
    case 'ia32':
      return 'i386';
    case 'arm':
      return 'arm';
    default:
      return nodeArch;
  }
}

/**
 * Explicit host command prefix from HOST_COMMAND_PREFIX.
 * Returns null when unset, so the caller can auto-detect a sandbox.
 */
export function parseCommandPrefix(value: string | undefined = env.HOST_COMMAND_PREFIX): string[] | null {
  if (value === undefined) return null;
  return value.split(/\s+/).filter(word => word.length > 0);
}

/**
 * Whether this process runs inside a Flatpak sandbox
 */
export function isSandboxed(): boolean {
  return existsSync('/.flatpak-info');
}
