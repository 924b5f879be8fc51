/**
 * Voice installer core
 *
 * What a UI needs to browse the voice catalog and install voices:
 *
 * ```typescript
 * import { VoiceInstaller } from './core/index.js';
 *
 * const installer = new VoiceInstaller({ bundleManager, serviceRegistry, controlChannel });
 * await installer.refreshCatalog();
 *
 * installer.subscribe('ui', ({ voiceRef, status, phase, progress }) => {
 *   render(voiceRef, status, phase, progress);
 * });
 *
 * installer.requestInstall('org.example.Speech.Provider.Voice.Alba');
 * ```
 */

export { VoiceInstaller, UnknownVoiceError } from './VoiceInstaller.js';
export type { VoiceInstallerOptions, InstallRequest } from './VoiceInstaller.js';

export { CatalogFetcher, CatalogUnavailableError, buildSnapshot, deriveProviders } from './catalog/CatalogFetcher.js';
export { filterVoices, matchesFilter } from './catalog/VoiceFilter.js';
export type { VoiceFilterCriteria } from './catalog/VoiceFilter.js';

export { InstallStateStore, derivedStatus } from './state/InstallStateStore.js';
export { InstallEventBus } from './events/InstallEventBus.js';
export type { EventSubscription, InstallEventPayload } from './events/InstallEventBus.js';

export { BundleLockMap } from './install/BundleLockMap.js';
export { DependencyResolver } from './install/DependencyResolver.js';
export type { InstallStep } from './install/DependencyResolver.js';
export { InstallOrchestrator, InstallError, OperationCancelledError } from './install/InstallOrchestrator.js';
export type { InstallOperation } from './install/InstallOrchestrator.js';

export { ProviderRefreshCoordinator } from './refresh/ProviderRefreshCoordinator.js';

export { FlatpakBundleManager } from './flatpak/FlatpakBundleManager.js';
export { InstallationMonitor } from './flatpak/InstallationMonitor.js';
export { DBusProviderBus } from './dbus/DBusProviderBus.js';
export { HostCommandRunner, CommandError } from './host/HostCommandRunner.js';

export { isBusy, describeStatus } from '../types/voice.types.js';
export { INSTALL_EVENTS } from '../types/install-events.types.js';
export type * from '../types/voice.types.js';
export type * from '../types/bundle.types.js';
export type * from '../types/install-events.types.js';
