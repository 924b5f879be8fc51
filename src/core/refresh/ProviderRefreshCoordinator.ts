import type { ProviderControlChannel, ServiceInstance, ServiceRegistry } from '../../types/bundle.types.js';
import type { RefreshResult, UnreachableInstance } from '../../types/install-events.types.js';
import { env } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';
import { TimeoutError, withTimeout } from '../../shared/utils/time.js';

const logger = new Logger('ProviderRefresh');

export interface ProviderRefreshOptions {
  /** Bound on each acknowledgment (default: REFRESH_TIMEOUT_MS) */
  timeoutMs?: number;
}

/**
 * Tells running provider processes that their voice registry changed.
 *
 * No running instance is not an error: a provider that is not running will
 * pick up the new voice the next time it starts.
 */
export class ProviderRefreshCoordinator {
  private registry: ServiceRegistry;
  private channel: ProviderControlChannel;
  private timeoutMs: number;

  constructor(registry: ServiceRegistry, channel: ProviderControlChannel, options: ProviderRefreshOptions = {}) {
    this.registry = registry;
    this.channel = channel;
    this.timeoutMs = options.timeoutMs ?? env.REFRESH_TIMEOUT_MS;
  }

  /**
   * Ask every running instance of a provider to reload its voices.
   * Never throws; unreachable instances are reported in the result.
   */
  async refresh(providerRef: string): Promise<RefreshResult> {
    let instances: ServiceInstance[];
    try {
      instances = await this.registry.listServicesMatching(providerRef);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not list running instances of ${providerRef}: ${message}`);
      return {
        kind: 'PartialFailure',
        refreshed: [],
        unreachable: [{ instance: { name: providerRef }, reason: 'unreachable', message }],
      };
    }

    if (instances.length === 0) {
      logger.debug(`No running instance of ${providerRef}, nothing to refresh`);
      return { kind: 'Success', refreshed: [] };
    }

    const settled = await Promise.allSettled(instances.map(instance => this.reload(instance)));

    const refreshed: ServiceInstance[] = [];
    const unreachable: UnreachableInstance[] = [];

    settled.forEach((outcome, index) => {
      const instance = instances[index];
      if (!instance) return;

      if (outcome.status === 'fulfilled') {
        refreshed.push(instance);
        return;
      }

      const error: unknown = outcome.reason;
      unreachable.push({
        instance,
        reason: error instanceof TimeoutError ? 'timeout' : 'unreachable',
        message: error instanceof Error ? error.message : String(error),
      });
    });

    if (unreachable.length > 0) {
      logger.warn(
        `Refresh of ${providerRef}: ${unreachable.length} of ${instances.length} instance(s) did not acknowledge`
      );
      return { kind: 'PartialFailure', refreshed, unreachable };
    }

    logger.info(`Refreshed ${refreshed.length} instance(s) of ${providerRef}`);
    return { kind: 'Success', refreshed };
  }

  /**
   * Reload one instance; the channel is aborted at the same deadline
   */
  private async reload(instance: ServiceInstance): Promise<void> {
    const controller = new AbortController();
    try {
      await withTimeout(
        this.channel.sendReloadVoices(instance, { signal: controller.signal }),
        this.timeoutMs,
        `Reload of ${instance.name}`
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        controller.abort(error);
      }
      throw error;
    }
  }
}
