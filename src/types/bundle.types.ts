import type { BundleOrigin, InstallProgress } from './voice.types.js';

/**
 * Collaborator contracts. The core only issues intents through these
 * interfaces and observes their outcomes; real implementations live in
 * core/flatpak and core/dbus, tests use in-process fakes.
 */

// ==================== Bundle Manager ====================

/**
 * A component as declared in a remote's metadata
 */
export interface RemoteComponent {
  /** Component id */
  id: string;

  /** Bundle reference used to install it (defaults to the id) */
  bundle?: string;

  name: string;
  summary?: string;

  /** Locale tags */
  languages: string[];

  /** Ids of the components this one extends (a voice extends its provider) */
  extends: string[];

  /** Download size in bytes */
  downloadSize?: number;
}

/**
 * One configured remote and its component index
 */
export interface RemoteListing {
  name: string;
  url: string;
  disabled: boolean;
  origin: BundleOrigin;
  components: RemoteComponent[];
}

/**
 * Everything the bundle manager's remotes offer
 */
export interface RemoteIndex {
  remotes: RemoteListing[];
}

/**
 * What to install or uninstall
 */
export interface BundleTarget {
  ref: string;
  origin: BundleOrigin;
}

export interface BundleOperationOptions {
  /** Called with advisory progress, when the bundle manager reports any */
  onProgress?: (progress: InstallProgress) => void;
}

export interface BundleManager {
  /** Read the remote index. Rejects on network or storage errors. */
  queryRemoteIndex(): Promise<RemoteIndex>;

  /** Refs currently installed locally */
  queryInstalledSet(): Promise<Set<string>>;

  /** Install one bundle; resolves once installed, rejects on failure */
  install(target: BundleTarget, options?: BundleOperationOptions): Promise<void>;

  /** Remove one bundle */
  uninstall(target: BundleTarget, options?: BundleOperationOptions): Promise<void>;
}

// ==================== Provider processes ====================

/**
 * A running provider process found on the service registry
 */
export interface ServiceInstance {
  /** Bus name the instance owns */
  name: string;

  /** Owning process id, when the registry knows it */
  pid?: number;
}

export interface ServiceRegistry {
  /** Running instances owning the given service identity */
  listServicesMatching(identity: string): Promise<ServiceInstance[]>;
}

export interface ReloadOptions {
  /** Aborted when the caller stops waiting for the acknowledgment */
  signal?: AbortSignal;
}

export interface ProviderControlChannel {
  /**
   * Ask an instance to reload its voices.
   * Resolves on acknowledgment; rejects when the instance is unreachable
   * or the signal is aborted.
   */
  sendReloadVoices(instance: ServiceInstance, options?: ReloadOptions): Promise<void>;
}
