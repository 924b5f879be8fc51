import { readFile } from 'fs/promises';
import { join } from 'path';
import type {
  BundleManager,
  BundleOperationOptions,
  BundleTarget,
  RemoteIndex,
  RemoteListing,
} from '../../types/bundle.types.js';
import type { InstallationKind } from '../../config/environment.js';
import { defaultArch, env, installationDir, parseInstallations } from '../../config/environment.js';
import type { CommandRunner } from '../host/HostCommandRunner.js';
import { runChecked } from '../host/HostCommandRunner.js';
import { parseCompressedCatalog } from './appstream.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('Flatpak');

/**
 * Options for the Flatpak bundle manager
 */
export interface FlatpakBundleManagerOptions {
  runner: CommandRunner;
  /** Installations to use, in scan order */
  installations?: InstallationKind[];
  binary?: string;
  arch?: string;
  /** Reads a remote's compressed appstream file; defaults to the local filesystem */
  readAppStream?: (path: string) => Promise<Buffer>;
}

/**
 * A configured remote as listed by `flatpak remotes`
 */
export interface FlatpakRemote {
  name: string;
  url: string;
  disabled: boolean;
}

/**
 * Parse `flatpak remotes --columns=name,url,options` output (tab separated)
 */
export function parseRemotes(output: string): FlatpakRemote[] {
  const remotes: FlatpakRemote[] = [];
  for (const line of output.split('\n')) {
    if (!line.trim()) continue;
    const [name = '', url = '', options = ''] = line.split('\t').map(part => part.trim());
    if (!name) continue;
    remotes.push({
      name,
      url,
      disabled: options.split(',').map(o => o.trim()).includes('disabled'),
    });
  }
  return remotes;
}

/**
 * Parse `flatpak list --columns=application` output
 */
export function parseInstalledApplications(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && line !== 'Application ID');
}

/**
 * Last percentage in a chunk of `flatpak install` output, if any
 */
export function parseProgress(chunk: string): number | null {
  const matches = [...chunk.matchAll(/(\d{1,3})%/g)];
  const last = matches[matches.length - 1];
  if (!last?.[1]) return null;
  const percent = parseInt(last[1], 10);
  return percent >= 0 && percent <= 100 ? percent : null;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Bundle manager backed by the `flatpak` command line tool and the
 * appstream data each remote keeps on disk.
 */
export class FlatpakBundleManager implements BundleManager {
  private runner: CommandRunner;
  private installations: InstallationKind[];
  private binary: string;
  private arch: string;
  private readAppStream: (path: string) => Promise<Buffer>;

  constructor(options: FlatpakBundleManagerOptions) {
    this.runner = options.runner;
    this.installations = options.installations ?? parseInstallations();
    this.binary = options.binary ?? env.FLATPAK_BINARY;
    this.arch = options.arch ?? defaultArch();
    this.readAppStream = options.readAppStream ?? ((path) => readFile(path));
  }

  /**
   * Path of a remote's active appstream catalog
   */
  appStreamPath(installation: InstallationKind, remote: string): string {
    return join(installationDir(installation), 'appstream', remote, this.arch, 'active', 'appstream.xml.gz');
  }

  async queryRemoteIndex(): Promise<RemoteIndex> {
    const remotes: RemoteListing[] = [];

    for (const installation of this.installations) {
      const output = await runChecked(this.runner, [
        this.binary,
        'remotes',
        `--${installation}`,
        '--columns=name,url,options',
      ]);

      for (const remote of parseRemotes(output)) {
        const path = this.appStreamPath(installation, remote.name);

        let data: Buffer;
        try {
          data = await this.readAppStream(path);
        } catch (error) {
          if (isMissingFile(error)) {
            logger.debug(`No appstream data for ${installation} remote ${remote.name}`);
            continue;
          }
          throw error;
        }

        remotes.push({
          name: remote.name,
          url: remote.url,
          disabled: remote.disabled,
          origin: { installation, remote: remote.name },
          components: parseCompressedCatalog(data),
        });
      }
    }

    return { remotes };
  }

  async queryInstalledSet(): Promise<Set<string>> {
    const installed = new Set<string>();

    for (const installation of this.installations) {
      const output = await runChecked(this.runner, [
        this.binary,
        'list',
        `--${installation}`,
        '--columns=application',
      ]);
      for (const id of parseInstalledApplications(output)) {
        installed.add(id);
      }
    }

    return installed;
  }

  async install(target: BundleTarget, options: BundleOperationOptions = {}): Promise<void> {
    const { installation, remote } = target.origin;
    logger.info(`Installing ${target.ref} from ${remote} (${installation})`);

    await runChecked(
      this.runner,
      [this.binary, 'install', `--${installation}`, '--noninteractive', '-y', remote, target.ref],
      { onStdout: this.progressReporter(options) }
    );
  }

  async uninstall(target: BundleTarget, options: BundleOperationOptions = {}): Promise<void> {
    const { installation } = target.origin;
    logger.info(`Uninstalling ${target.ref} (${installation})`);

    await runChecked(
      this.runner,
      [this.binary, 'uninstall', `--${installation}`, '--noninteractive', '-y', target.ref],
      { onStdout: this.progressReporter(options) }
    );
  }

  private progressReporter(options: BundleOperationOptions): ((chunk: string) => void) | undefined {
    const { onProgress } = options;
    if (!onProgress) return undefined;

    let lastPercent = -1;
    return (chunk) => {
      const percent = parseProgress(chunk);
      if (percent !== null && percent !== lastPercent) {
        lastPercent = percent;
        onProgress({ percent });
      }
    };
  }
}
