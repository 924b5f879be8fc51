import { VoiceInstaller } from './core/VoiceInstaller.js';
import { HostCommandRunner } from './core/host/HostCommandRunner.js';
import { FlatpakBundleManager } from './core/flatpak/FlatpakBundleManager.js';
import { InstallationMonitor } from './core/flatpak/InstallationMonitor.js';
import { DBusProviderBus } from './core/dbus/DBusProviderBus.js';
import { Logger } from './shared/utils/logger.js';

const logger = new Logger('App');

/**
 * Global installer instance
 */
let installer: VoiceInstaller | null = null;
let monitor: InstallationMonitor | null = null;

export interface StartOptions {
  /** Follow installs and removals made by other programs */
  watchInstallations?: boolean;
}

/**
 * Wire the host adapters, then load the catalog
 */
export async function startInstaller(options: StartOptions = {}): Promise<VoiceInstaller> {
  if (installer) {
    logger.warn('Voice installer is already running');
    return installer;
  }

  const runner = await HostCommandRunner.create();
  const providerBus = new DBusProviderBus({ runner });

  const instance = new VoiceInstaller({
    bundleManager: new FlatpakBundleManager({ runner }),
    serviceRegistry: providerBus,
    controlChannel: providerBus,
  });
  installer = instance;

  await instance.refreshCatalog();

  if (options.watchInstallations) {
    monitor = new InstallationMonitor();
    monitor.start(() => instance.syncInstalledState());
  }

  return instance;
}

/**
 * Let in-flight operations finish, then release everything
 */
export async function stopInstaller(): Promise<void> {
  monitor?.stop();
  monitor = null;

  if (!installer) {
    return;
  }

  await installer.shutdown();
  installer = null;
  logger.debug('Voice installer stopped');
}
