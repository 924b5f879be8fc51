import type { ProviderControlChannel, ReloadOptions, ServiceInstance, ServiceRegistry } from '../../types/bundle.types.js';
import { env } from '../../config/environment.js';
import type { CommandRunner, RunOptions } from '../host/HostCommandRunner.js';
import { runChecked } from '../host/HostCommandRunner.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('DBusProviderBus');

const BUS_NAME = 'org.freedesktop.DBus';
const BUS_PATH = '/org/freedesktop/DBus';

export interface DBusProviderBusOptions {
  runner: CommandRunner;
  bus?: 'session' | 'system';
  /** Reply timeout handed to dbus-send for the activation ping */
  replyTimeoutMs?: number;
}

/**
 * String values from `dbus-send --print-reply` output
 */
export function parseStringReplies(output: string): string[] {
  return [...output.matchAll(/^\s*string "(.*)"\s*$/gm)]
    .map(match => match[1])
    .filter((value): value is string => value !== undefined);
}

/**
 * First uint32 value from `dbus-send --print-reply` output
 */
export function parseUint32Reply(output: string): number | null {
  const match = /^\s*uint32 (\d+)\s*$/m.exec(output);
  return match?.[1] ? parseInt(match[1], 10) : null;
}

/**
 * Whether a bus name belongs to a provider identity: the name itself or
 * a name below it (`org.example.Provider.Instance2`)
 */
export function matchesIdentity(name: string, identity: string): boolean {
  return name === identity || name.startsWith(`${identity}.`);
}

/**
 * Finds and reloads provider processes over D-Bus, using `dbus-send`.
 *
 * A provider re-reads its voices when it starts, so reloading means
 * terminating the running process and pinging its bus name, which makes
 * the bus activate a fresh instance. The ping reply is the acknowledgment.
 */
export class DBusProviderBus implements ServiceRegistry, ProviderControlChannel {
  private runner: CommandRunner;
  private bus: 'session' | 'system';
  private replyTimeoutMs: number;

  constructor(options: DBusProviderBusOptions) {
    this.runner = options.runner;
    this.bus = options.bus ?? env.DBUS_BUS;
    this.replyTimeoutMs = options.replyTimeoutMs ?? env.REFRESH_TIMEOUT_MS;
  }

  private call(dest: string, path: string, method: string, args: string[] = [], options?: RunOptions): Promise<string> {
    return runChecked(this.runner, [
      'dbus-send',
      `--${this.bus}`,
      '--print-reply',
      `--reply-timeout=${this.replyTimeoutMs}`,
      `--dest=${dest}`,
      path,
      method,
      ...args,
    ], options);
  }

  async listServicesMatching(identity: string): Promise<ServiceInstance[]> {
    const names = parseStringReplies(await this.call(BUS_NAME, BUS_PATH, `${BUS_NAME}.ListNames`));
    const matching = names.filter(name => matchesIdentity(name, identity));

    const instances: ServiceInstance[] = [];
    for (const name of matching) {
      instances.push({ name, pid: await this.lookupPid(name) });
    }

    logger.debug(`Found ${instances.length} running instance(s) of ${identity}`);
    return instances;
  }

  async sendReloadVoices(instance: ServiceInstance, options: ReloadOptions = {}): Promise<void> {
    const runOptions: RunOptions = { signal: options.signal };

    if (instance.pid !== undefined) {
      const result = await this.runner.run(['kill', String(instance.pid)], runOptions);
      if (result.code !== 0) {
        logger.warn(`Could not stop ${instance.name} (pid ${instance.pid}): ${result.stderr.trim()}`);
      }
    }

    await this.call(instance.name, '/', 'org.freedesktop.DBus.Peer.Ping', [], runOptions);
    logger.debug(`${instance.name} acknowledged reload`);
  }

  /**
   * Owning pid of a bus name; undefined when the bus will not say
   */
  private async lookupPid(name: string): Promise<number | undefined> {
    try {
      const output = await this.call(BUS_NAME, BUS_PATH, `${BUS_NAME}.GetConnectionUnixProcessID`, [`string:${name}`]);
      return parseUint32Reply(output) ?? undefined;
    } catch (error) {
      logger.debug(`No pid for ${name}:`, error);
      return undefined;
    }
  }
}
