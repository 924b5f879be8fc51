import type { BundleManager } from '../../types/bundle.types.js';
import type { VoiceEntry } from '../../types/voice.types.js';
import type { BundleLockMap } from './BundleLockMap.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('DependencyResolver');

/**
 * One step of a voice install, executed strictly in order
 */
export type InstallStep = 'InstallProvider' | 'WaitForProvider' | 'InstallVoice';

/**
 * Result of resolving a voice
 */
export interface DependencyResolutionResult {
  /** Steps in execution order (provider first); empty when nothing to do */
  steps: InstallStep[];

  /** Installed set the decision was based on */
  installed: ReadonlySet<string>;
}

/**
 * Decides which bundles must be installed, in which order, for a voice.
 *
 * A voice depends on exactly one provider. The provider is installed first
 * unless it is already present, or unless another request is installing it
 * right now, in which case the voice waits for that install instead of
 * starting a second one.
 */
export class DependencyResolver {
  private bundleManager: BundleManager;
  private locks: BundleLockMap;

  constructor(bundleManager: BundleManager, locks: BundleLockMap) {
    this.bundleManager = bundleManager;
    this.locks = locks;
  }

  /**
   * Steps needed to install a voice
   */
  async resolve(voice: VoiceEntry): Promise<InstallStep[]> {
    const { steps } = await this.resolveWithContext(voice);
    return steps;
  }

  /**
   * Resolve and also return the installed set used for the decision.
   * The installed set is queried once per resolution.
   */
  async resolveWithContext(voice: VoiceEntry): Promise<DependencyResolutionResult> {
    const installed = await this.bundleManager.queryInstalledSet();
    const steps = this.stepsFor(voice, installed);

    logger.debug(`Resolved ${voice.ref}: [${steps.join(', ')}]`);

    return { steps, installed };
  }

  /**
   * Pure step computation against a known installed set
   */
  stepsFor(voice: VoiceEntry, installed: ReadonlySet<string>): InstallStep[] {
    if (installed.has(voice.ref)) {
      return [];
    }

    if (installed.has(voice.providerRef)) {
      return ['InstallVoice'];
    }

    if (this.locks.get(voice.providerRef)?.kind === 'install') {
      return ['WaitForProvider', 'InstallVoice'];
    }

    return ['InstallProvider', 'InstallVoice'];
  }
}
