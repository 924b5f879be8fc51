import { existsSync, watch } from 'fs';
import type { FSWatcher } from 'fs';
import type { InstallationKind } from '../../config/environment.js';
import { installationDir, parseInstallations } from '../../config/environment.js';
import { debounce } from '../../shared/utils/time.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('InstallationMonitor');

/** Flatpak touches this file whenever an installation changes */
const CHANGED_MARKER = '.changed';

export interface InstallationMonitorOptions {
  installations?: InstallationKind[];
  /** Directories to watch instead of the installations' own */
  directories?: string[];
  debounceMs?: number;
}

/**
 * Notices installs and removals made outside this process (another
 * frontend, the command line) and reports them, debounced.
 */
export class InstallationMonitor {
  private watchers: FSWatcher[] = [];
  private directories: string[];
  private debounceMs: number;
  private notify: { (): void; cancel(): void } | null = null;

  constructor(options: InstallationMonitorOptions = {}) {
    this.directories =
      options.directories ?? (options.installations ?? parseInstallations()).map(kind => installationDir(kind));
    this.debounceMs = options.debounceMs ?? 500;
  }

  /**
   * Start watching. `onChanged` runs at most once per quiet period.
   */
  start(onChanged: () => Promise<void>): void {
    if (this.watchers.length > 0) {
      logger.warn('InstallationMonitor is already running');
      return;
    }

    this.notify = debounce(() => {
      onChanged().catch((error: unknown) => {
        logger.error('Failed to handle installation change:', error);
      });
    }, this.debounceMs);

    for (const dir of this.directories) {
      if (!existsSync(dir)) {
        logger.debug(`Installation directory ${dir} does not exist, not watching`);
        continue;
      }

      try {
        const watcher = watch(dir, (_event, filename) => {
          if (filename === null || filename.toString() === CHANGED_MARKER) {
            this.notify?.();
          }
        });
        watcher.on('error', (error) => {
          logger.warn(`Watcher for ${dir} failed:`, error);
        });
        this.watchers.push(watcher);
        logger.debug(`Watching ${dir}`);
      } catch (error) {
        logger.warn(`Cannot watch ${dir}:`, error);
      }
    }
  }

  stop(): void {
    for (const watcher of this.watchers) {
      watcher.close();
    }
    this.watchers = [];
    this.notify?.cancel();
    this.notify = null;
  }
}
