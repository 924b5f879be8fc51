import type { InstallationKind } from '../config/environment.js';

/**
 * Where a bundle comes from
 */
export interface BundleOrigin {
  /** Installation the remote is configured in */
  installation: InstallationKind;

  /** Remote (repository) name within that installation */
  remote: string;
}

/**
 * An installable voice, as read from the catalog.
 * Immutable; replaced wholesale on the next catalog fetch.
 */
export interface VoiceEntry {
  /** Unique bundle reference (e.g. "org.example.Speech.Provider.Voice.Alba") */
  readonly ref: string;

  /** Display name */
  readonly name: string;

  /** Short description from the bundle metadata */
  readonly summary?: string;

  /** Canonical BCP-47 tags the voice speaks */
  readonly languages: readonly string[];

  /** Primary locale tag (first language, "und" when none) */
  readonly locale: string;

  /** Sorted distinct language names (without region) */
  readonly languageNames: readonly string[];

  /** Sorted distinct language names including region */
  readonly languageAndRegionNames: readonly string[];

  /** Bundle reference of the provider this voice plugs into */
  readonly providerRef: string;

  /** Display name of the provider */
  readonly providerName: string;

  /** Approximate download size in bytes */
  readonly downloadSize?: number;

  readonly origin: BundleOrigin;
}

/**
 * A speech provider bundle, derived from the voices that require it
 */
export interface ProviderEntry {
  readonly ref: string;
  readonly name: string;
  readonly origin: BundleOrigin;
}

/**
 * Failure reasons a voice can carry.
 * `ResolutionFailed`: the installed set could not be read before any step ran.
 * `UninstallFailed` is only reported in outcomes; the voice stays Installed.
 */
export type FailureReason =
  | 'ProviderInstallFailed'
  | 'VoiceInstallFailed'
  | 'ResolutionFailed'
  | 'UninstallFailed';

/**
 * Sub-phase of an in-flight install
 */
export type InstallingPhase =
  | 'resolving'
  | 'installing-provider'
  | 'installing-voice'
  | 'refreshing-providers';

/**
 * Advisory progress reported by the bundle manager
 */
export interface InstallProgress {
  /** 0-100 */
  percent?: number;
  bytesDone?: number;
  bytesTotal?: number;
}

/**
 * Status attached to every catalog voice. Exactly one at any time.
 */
export type InstallStatus =
  | { kind: 'Unavailable' }
  | { kind: 'ProviderOnly' }
  | { kind: 'Installed' }
  | { kind: 'Installing'; phase: InstallingPhase; progress?: InstallProgress }
  | { kind: 'Uninstalling' }
  | { kind: 'Failed'; reason: FailureReason; message: string };

export type InstallStatusKind = InstallStatus['kind'];

/**
 * Whether an operation currently owns the voice
 */
export function isBusy(status: InstallStatus): boolean {
  return status.kind === 'Installing' || status.kind === 'Uninstalling';
}

/**
 * Short label for logs and the CLI
 */
export function describeStatus(status: InstallStatus): string {
  switch (status.kind) {
    case 'Installing': {
      const percent = status.progress?.percent;
      return percent === undefined ? `Installing (${status.phase})` : `Installing (${status.phase}, ${percent}%)`;
    }
    case 'Failed':
      return `Failed (${status.reason}: ${status.message})`;
    default:
      return status.kind;
  }
}

/**
 * Snapshot of the catalog exposed to the UI
 */
export interface CatalogSnapshot {
  voices: readonly VoiceEntry[];

  /** Deduplicated providers, first-seen order */
  providers: readonly ProviderEntry[];

  /** Sorted distinct language names across all voices */
  languages: readonly string[];

  /** Set when the last fetch failed; the voice list is then empty */
  error?: string;

  fetchedAt?: Date;
}
