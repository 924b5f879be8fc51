import type { BundleManager, ProviderControlChannel, ServiceRegistry } from '../types/bundle.types.js';
import type { CatalogSnapshot, InstallStatus, VoiceEntry } from '../types/voice.types.js';
import { isBusy } from '../types/voice.types.js';
import type { InstallOutcome, VoiceChangedEvent } from '../types/install-events.types.js';
import { INSTALL_EVENTS } from '../types/install-events.types.js';
import { CatalogFetcher, CatalogUnavailableError, buildSnapshot } from './catalog/CatalogFetcher.js';
import type { CatalogFetcherOptions } from './catalog/CatalogFetcher.js';
import { filterVoices } from './catalog/VoiceFilter.js';
import type { VoiceFilterCriteria } from './catalog/VoiceFilter.js';
import { InstallEventBus } from './events/InstallEventBus.js';
import type { EventSubscription } from './events/InstallEventBus.js';
import { InstallStateStore } from './state/InstallStateStore.js';
import { InstallOrchestrator } from './install/InstallOrchestrator.js';
import type { InstallOperation } from './install/InstallOrchestrator.js';
import { ProviderRefreshCoordinator } from './refresh/ProviderRefreshCoordinator.js';
import type { ProviderRefreshOptions } from './refresh/ProviderRefreshCoordinator.js';
import { Logger } from '../shared/utils/logger.js';

const logger = new Logger('VoiceInstaller');

/**
 * Error thrown when a request names a voice that is not in the catalog
 */
export class UnknownVoiceError extends Error {
  constructor(public readonly voiceRef: string) {
    super(`Voice "${voiceRef}" is not in the catalog`);
    this.name = 'UnknownVoiceError';
  }
}

/**
 * Options for voice installer initialization
 */
export interface VoiceInstallerOptions {
  bundleManager: BundleManager;
  serviceRegistry: ServiceRegistry;
  controlChannel: ProviderControlChannel;
  catalog?: CatalogFetcherOptions;
  refresh?: ProviderRefreshOptions;
  events?: InstallEventBus;
}

/**
 * Result of an install or uninstall request
 */
export interface InstallRequest {
  /** Status right after the request was taken */
  status: InstallStatus;

  /** The operation doing the work; absent when the request was a no-op */
  operation?: InstallOperation;
}

/**
 * Entry point for the UI: catalog snapshot, per-voice status, install
 * requests and a change feed. Wires the catalog fetcher, state store,
 * resolver, orchestrator and refresh coordinator together.
 */
export class VoiceInstaller {
  readonly events: InstallEventBus;
  private bundleManager: BundleManager;
  private fetcher: CatalogFetcher;
  private store: InstallStateStore;
  private orchestrator: InstallOrchestrator;

  constructor(options: VoiceInstallerOptions) {
    this.bundleManager = options.bundleManager;
    this.events = options.events ?? new InstallEventBus();
    this.fetcher = new CatalogFetcher(options.bundleManager, options.catalog);
    this.store = new InstallStateStore(this.events);
    this.orchestrator = new InstallOrchestrator({
      bundleManager: options.bundleManager,
      store: this.store,
      events: this.events,
      refresher: new ProviderRefreshCoordinator(options.serviceRegistry, options.controlChannel, options.refresh),
    });
  }

  /**
   * Fetch the catalog and derive every voice's status.
   *
   * A failure leaves an empty catalog carrying the error message, so the UI
   * can show a banner with a retry action. Previous entries are not kept.
   */
  async refreshCatalog(): Promise<CatalogSnapshot> {
    let snapshot: CatalogSnapshot;
    let installed: Set<string> = new Set();

    try {
      const voices = await this.fetcher.fetchCatalog();
      installed = await this.bundleManager.queryInstalledSet();
      snapshot = buildSnapshot(voices);
    } catch (error) {
      const failure = error instanceof CatalogUnavailableError
        ? error
        : new CatalogUnavailableError(error instanceof Error ? error.message : String(error), error);
      logger.warn(failure.message);
      snapshot = { voices: [], providers: [], languages: [], error: failure.message };
    }

    this.store.populate(snapshot, installed);
    this.events.publish(INSTALL_EVENTS.CATALOG_UPDATED, 'voice-installer', {
      voiceCount: snapshot.voices.length,
      providerCount: snapshot.providers.length,
      error: snapshot.error,
    });

    return snapshot;
  }

  getCatalog(): CatalogSnapshot {
    return this.store.getCatalog();
  }

  /**
   * Catalog voices matching browse filters
   */
  findVoices(criteria: VoiceFilterCriteria = {}): VoiceEntry[] {
    return filterVoices(this.store.getCatalog().voices, criteria);
  }

  getVoice(voiceRef: string): VoiceEntry | undefined {
    return this.store.getVoice(voiceRef);
  }

  getStatus(voiceRef: string): InstallStatus | undefined {
    return this.store.getStatus(voiceRef);
  }

  /**
   * Request installation of a voice.
   *
   * Installed voices are a no-op. A voice that already has an operation in
   * flight returns its current status without queuing anything. A failed
   * voice starts over from dependency resolution.
   * @throws UnknownVoiceError if the ref is not in the catalog
   */
  requestInstall(voiceRef: string): InstallRequest {
    const voice = this.requireVoice(voiceRef);
    const status = this.currentStatus(voice);

    if (status.kind === 'Installed') {
      logger.debug(`${voiceRef} is already installed`);
      return { status };
    }

    if (isBusy(status)) {
      logger.debug(`${voiceRef} already has an operation in flight`);
      return { status, operation: this.orchestrator.getOperation(voiceRef) };
    }

    const operation = this.orchestrator.install(voice);
    return { status: this.currentStatus(voice), operation };
  }

  /**
   * Cancel an in-flight install. Only possible before the voice bundle
   * itself starts installing.
   * @returns whether the cancellation was accepted
   */
  cancelInstall(voiceRef: string): boolean {
    this.requireVoice(voiceRef);
    return this.orchestrator.cancel(voiceRef);
  }

  /**
   * Request removal of an installed voice. Anything but Installed is a no-op.
   * @throws UnknownVoiceError if the ref is not in the catalog
   */
  requestUninstall(voiceRef: string): InstallRequest {
    const voice = this.requireVoice(voiceRef);
    const status = this.currentStatus(voice);

    if (status.kind !== 'Installed') {
      logger.debug(`${voiceRef} is not installed (${status.kind}), nothing to remove`);
      return { status, operation: this.orchestrator.getOperation(voiceRef) };
    }

    const operation = this.orchestrator.uninstall(voice);
    return { status: this.currentStatus(voice), operation };
  }

  /**
   * Resolves once the voice has no operation in flight
   */
  async settled(voiceRef: string): Promise<InstallOutcome | null> {
    const operation = this.orchestrator.getOperation(voiceRef);
    return operation ? operation.result : null;
  }

  /**
   * Subscribe to `{ voiceRef, status, phase, progress }` changes
   */
  subscribe(subscriberId: string, listener: (event: VoiceChangedEvent) => void): EventSubscription {
    return this.events.on(INSTALL_EVENTS.VOICE_CHANGED, subscriberId, ({ data }) => listener(data));
  }

  /**
   * Re-read the installed set and update voices nobody is working on.
   * Called when the bundle manager reports an external change.
   */
  async syncInstalledState(): Promise<void> {
    const installed = await this.bundleManager.queryInstalledSet();
    this.store.syncInstalled(installed);
  }

  /**
   * Wait for all in-flight operations, then drop subscriptions
   */
  async shutdown(): Promise<void> {
    await this.orchestrator.drain();
    this.events.clear();
  }

  private requireVoice(voiceRef: string): VoiceEntry {
    const voice = this.store.getVoice(voiceRef);
    if (!voice) {
      throw new UnknownVoiceError(voiceRef);
    }
    return voice;
  }

  private currentStatus(voice: VoiceEntry): InstallStatus {
    return this.store.getStatus(voice.ref) ?? { kind: 'Unavailable' };
  }
}
