import type { BundleManager, BundleTarget } from '../../types/bundle.types.js';
import type {
  FailureReason,
  InstallingPhase,
  InstallProgress,
  InstallStatus,
  VoiceEntry,
} from '../../types/voice.types.js';
import type {
  InstallOutcome,
  InstallPhase,
  InstallStreamEvent,
  RefreshResult,
} from '../../types/install-events.types.js';
import { INSTALL_EVENTS } from '../../types/install-events.types.js';
import type { InstallEventBus } from '../events/InstallEventBus.js';
import type { InstallStateStore } from '../state/InstallStateStore.js';
import { derivedStatus } from '../state/InstallStateStore.js';
import type { ProviderRefreshCoordinator } from '../refresh/ProviderRefreshCoordinator.js';
import { BundleLockMap } from './BundleLockMap.js';
import { DependencyResolver } from './DependencyResolver.js';
import type { InstallStep } from './DependencyResolver.js';
import { InstallStream } from './InstallStream.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('InstallOrchestrator');

const SOURCE = 'install-orchestrator';

/**
 * Error thrown when a bundle step of an install fails
 */
export class InstallError extends Error {
  constructor(
    public readonly reason: FailureReason,
    public readonly ref: string,
    public readonly cause: unknown
  ) {
    super(`${reason} for ${ref}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'InstallError';
  }
}

/**
 * Error raised inside a run when the user cancelled before the voice step
 */
export class OperationCancelledError extends Error {
  constructor(public readonly voiceRef: string) {
    super(`Install of ${voiceRef} was cancelled`);
    this.name = 'OperationCancelledError';
  }
}

/**
 * Message shown to the user: the underlying cause when there is one
 */
function failureMessage(error: unknown): string {
  const cause = error instanceof InstallError ? error.cause : error;
  return cause instanceof Error ? cause.message : String(cause);
}

export type OperationKind = 'install' | 'uninstall';

/**
 * Handle for one voice's install or uninstall run
 */
export interface InstallOperation {
  readonly voiceRef: string;
  readonly kind: OperationKind;

  /** Current state-machine phase */
  readonly phase: InstallPhase;

  /** Phase and progress events, replayable from the start */
  readonly events: AsyncIterable<InstallStreamEvent>;

  /** Settles with the outcome; never rejects */
  readonly result: Promise<InstallOutcome>;

  /**
   * Request cancellation. Only honoured before the voice step starts.
   * @returns whether the request was accepted
   */
  cancel(): boolean;
}

/**
 * Mutable run state behind an InstallOperation
 */
class OperationState implements InstallOperation {
  phase: InstallPhase = 'Idle';
  cancelRequested = false;
  providerReady = false;
  readonly stream = new InstallStream<InstallStreamEvent>();
  result: Promise<InstallOutcome> = Promise.resolve({ kind: 'Installed', refresh: null });

  constructor(
    readonly voiceRef: string,
    readonly kind: OperationKind
  ) {}

  get events(): AsyncIterable<InstallStreamEvent> {
    return this.stream;
  }

  get cancellable(): boolean {
    return this.kind === 'install' && (this.phase === 'Idle' || this.phase === 'Resolving' || this.phase === 'InstallingProvider');
  }

  cancel(): boolean {
    if (!this.cancellable) {
      logger.debug(`Cancel of ${this.voiceRef} ignored in phase ${this.phase}`);
      return false;
    }
    this.cancelRequested = true;
    logger.info(`Cancellation requested for ${this.voiceRef} (phase ${this.phase})`);
    return true;
  }
}

const INSTALLING_PHASES: Partial<Record<InstallPhase, InstallingPhase>> = {
  Resolving: 'resolving',
  InstallingProvider: 'installing-provider',
  InstallingVoice: 'installing-voice',
  Refreshing: 'refreshing-providers',
};

export interface InstallOrchestratorOptions {
  bundleManager: BundleManager;
  store: InstallStateStore;
  refresher: ProviderRefreshCoordinator;
  events: InstallEventBus;
  locks?: BundleLockMap;
  resolver?: DependencyResolver;
}

/**
 * Drives the provider-then-voice install sequence.
 *
 * States per voice:
 *   Idle → Resolving → InstallingProvider? → InstallingVoice → Refreshing → Done
 * with Failed reachable from every non-terminal state, and Cancelled from
 * Resolving or InstallingProvider. Steps of one voice run strictly in order.
 * Requests for different voices run concurrently; the lock map keeps one
 * operation per bundle reference, so voices sharing a provider wait on a
 * single provider install.
 */
export class InstallOrchestrator {
  readonly locks: BundleLockMap;
  readonly resolver: DependencyResolver;
  private bundleManager: BundleManager;
  private store: InstallStateStore;
  private refresher: ProviderRefreshCoordinator;
  private events: InstallEventBus;

  /** Operations in flight, by voice ref */
  private operations: Map<string, OperationState> = new Map();

  constructor(options: InstallOrchestratorOptions) {
    this.bundleManager = options.bundleManager;
    this.store = options.store;
    this.refresher = options.refresher;
    this.events = options.events;
    this.locks = options.locks ?? new BundleLockMap();
    this.resolver = options.resolver ?? new DependencyResolver(options.bundleManager, this.locks);
  }

  /**
   * The in-flight operation for a voice, if any
   */
  getOperation(voiceRef: string): InstallOperation | undefined {
    return this.operations.get(voiceRef);
  }

  /**
   * Start installing a voice (and its provider when needed).
   * Returns immediately; observe progress through the returned handle.
   * If the voice already has an operation in flight, that operation is returned.
   */
  install(voice: VoiceEntry): InstallOperation {
    const existing = this.operations.get(voice.ref);
    if (existing) {
      logger.debug(`${voice.ref} already has a ${existing.kind} in flight`);
      return existing;
    }

    const op = new OperationState(voice.ref, 'install');
    this.operations.set(voice.ref, op);
    op.result = this.settle(op, voice, () => this.runInstall(op, voice));
    return op;
  }

  /**
   * Start removing an installed voice. The provider is kept.
   */
  uninstall(voice: VoiceEntry): InstallOperation {
    const existing = this.operations.get(voice.ref);
    if (existing) {
      logger.debug(`${voice.ref} already has a ${existing.kind} in flight`);
      return existing;
    }

    const op = new OperationState(voice.ref, 'uninstall');
    this.operations.set(voice.ref, op);
    op.result = this.settle(op, voice, () => this.runUninstall(op, voice));
    return op;
  }

  /**
   * Cancel a voice's in-flight install
   * @returns whether cancellation was accepted
   */
  cancel(voiceRef: string): boolean {
    return this.operations.get(voiceRef)?.cancel() ?? false;
  }

  /**
   * Wait for every in-flight operation to settle
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.operations.values(), op => op.result));
  }

  // ==================== Runs ====================

  private async runInstall(op: OperationState, voice: VoiceEntry): Promise<InstallOutcome> {
    this.enter(op, 'Resolving');

    let steps: InstallStep[];
    let installed: ReadonlySet<string>;
    try {
      ({ steps, installed } = await this.resolver.resolveWithContext(voice));
    } catch (error) {
      return this.fail(op, voice, new InstallError('ResolutionFailed', voice.ref, error));
    }

    if (steps.length === 0) {
      logger.info(`${voice.ref} is already installed`);
      return this.finish(op, voice, { kind: 'Installed' }, { kind: 'Installed', refresh: null });
    }

    if (op.cancelRequested) {
      return this.cancelled(op, voice, derivedStatus(voice, installed));
    }

    try {
      for (const step of steps) {
        switch (step) {
          case 'InstallProvider':
          case 'WaitForProvider':
            this.enter(op, 'InstallingProvider');
            await this.ensureProvider(op, voice, step);
            op.providerReady = true;
            if (op.cancelRequested) {
              throw new OperationCancelledError(voice.ref);
            }
            break;

          case 'InstallVoice':
            if (op.cancelRequested) {
              throw new OperationCancelledError(voice.ref);
            }
            this.enter(op, 'InstallingVoice');
            await this.runBundleStep(op, this.voiceTarget(voice), 'install', 'VoiceInstallFailed');
            break;
        }
      }
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        const status: InstallStatus = op.providerReady ? { kind: 'ProviderOnly' } : derivedStatus(voice, installed);
        return this.cancelled(op, voice, status);
      }
      return this.fail(op, voice, error);
    }

    this.enter(op, 'Refreshing');
    const refresh = await this.refreshProvider(voice.providerRef);

    logger.info(`Installed ${voice.ref}`);
    return this.finish(op, voice, { kind: 'Installed' }, { kind: 'Installed', refresh });
  }

  private async runUninstall(op: OperationState, voice: VoiceEntry): Promise<InstallOutcome> {
    this.enter(op, 'Uninstalling', { kind: 'Uninstalling' });

    try {
      await this.runBundleStep(op, this.voiceTarget(voice), 'uninstall', 'UninstallFailed');
    } catch (error) {
      const message = failureMessage(error);
      logger.error(`Uninstall of ${voice.ref} failed: ${message}`);
      return this.finish(
        op,
        voice,
        { kind: 'Installed' },
        { kind: 'Failed', reason: 'UninstallFailed', message },
        'Failed'
      );
    }

    let status: InstallStatus = { kind: 'ProviderOnly' };
    try {
      status = derivedStatus(voice, await this.bundleManager.queryInstalledSet());
    } catch (error) {
      logger.warn(`Could not re-read installed set after removing ${voice.ref}:`, error);
    }

    this.enter(op, 'Refreshing', { kind: 'Uninstalling' });
    const refresh = await this.refreshProvider(voice.providerRef);

    logger.info(`Uninstalled ${voice.ref}`);
    return this.finish(op, voice, status, { kind: 'Uninstalled', refresh });
  }

  // ==================== Steps ====================

  /**
   * Make sure the provider is installed, either by installing it or by
   * waiting for the request that already is.
   */
  private async ensureProvider(op: OperationState, voice: VoiceEntry, step: InstallStep): Promise<void> {
    const held = this.locks.get(voice.providerRef);
    if (held?.kind === 'install') {
      logger.info(`Waiting for in-flight install of provider ${voice.providerRef}`);
      try {
        await held.done;
      } catch (error) {
        throw new InstallError('ProviderInstallFailed', voice.providerRef, error);
      }
      return;
    }

    if (step === 'WaitForProvider') {
      // The install we meant to wait for already finished; check its result
      let installed: ReadonlySet<string>;
      try {
        installed = await this.bundleManager.queryInstalledSet();
      } catch (error) {
        throw new InstallError('ProviderInstallFailed', voice.providerRef, error);
      }
      if (installed.has(voice.providerRef)) return;
    }

    await this.runBundleStep(op, this.providerTarget(voice), 'install', 'ProviderInstallFailed');
  }

  /**
   * Run one bundle-manager call under the bundle's lock
   */
  private async runBundleStep(
    op: OperationState,
    target: BundleTarget,
    kind: 'install' | 'uninstall',
    reason: FailureReason
  ): Promise<void> {
    const onProgress = (progress: InstallProgress) => this.reportProgress(op, progress);

    const { done, joined } = this.locks.run(target.ref, kind, () =>
      kind === 'install'
        ? this.bundleManager.install(target, { onProgress })
        : this.bundleManager.uninstall(target, { onProgress })
    );

    if (joined) {
      logger.debug(`${op.voiceRef}: joined in-flight operation on ${target.ref}`);
    }

    try {
      await done;
    } catch (error) {
      throw new InstallError(reason, target.ref, error);
    }
  }

  private async refreshProvider(providerRef: string): Promise<RefreshResult | null> {
    try {
      const result = await this.refresher.refresh(providerRef);
      if (result.kind === 'PartialFailure') {
        for (const { instance, message } of result.unreachable) {
          logger.warn(`Provider ${providerRef} instance ${instance.name} was not refreshed: ${message}`);
        }
      }
      this.events.publish(INSTALL_EVENTS.PROVIDER_REFRESHED, SOURCE, { providerRef, result });
      return result;
    } catch (error) {
      logger.error(`Refreshing provider ${providerRef} failed:`, error);
      return null;
    }
  }

  // ==================== Transitions ====================

  private enter(op: OperationState, phase: InstallPhase, status?: InstallStatus): void {
    op.phase = phase;
    logger.debug(`${op.voiceRef}: ${phase}`);

    const installingPhase = INSTALLING_PHASES[phase];
    const next: InstallStatus | undefined =
      status ?? (installingPhase ? { kind: 'Installing', phase: installingPhase } : undefined);
    if (next) {
      this.store.setStatus(op.voiceRef, next, phase);
    }

    op.stream.push({ type: 'phase', voiceRef: op.voiceRef, phase });
  }

  private reportProgress(op: OperationState, progress: InstallProgress): void {
    const installingPhase = INSTALLING_PHASES[op.phase];
    if (installingPhase) {
      this.store.setStatus(op.voiceRef, { kind: 'Installing', phase: installingPhase, progress }, op.phase);
    }
    op.stream.push({ type: 'progress', voiceRef: op.voiceRef, phase: op.phase, progress });
  }

  private fail(op: OperationState, voice: VoiceEntry, error: unknown): InstallOutcome {
    const reason: FailureReason = error instanceof InstallError ? error.reason : 'VoiceInstallFailed';
    const message = failureMessage(error);

    logger.error(`Install of ${voice.ref} failed (${reason}): ${message}`);

    return this.finish(
      op,
      voice,
      { kind: 'Failed', reason, message },
      { kind: 'Failed', reason, message },
      'Failed'
    );
  }

  private cancelled(op: OperationState, voice: VoiceEntry, status: InstallStatus): InstallOutcome {
    logger.info(`Install of ${voice.ref} cancelled`);
    return this.finish(op, voice, status, { kind: 'Cancelled', status }, 'Cancelled');
  }

  private finish(
    op: OperationState,
    voice: VoiceEntry,
    status: InstallStatus,
    outcome: InstallOutcome,
    phase: InstallPhase = 'Done'
  ): InstallOutcome {
    op.phase = phase;
    this.operations.delete(voice.ref);
    this.store.setStatus(voice.ref, status, phase);
    op.stream.push({ type: 'phase', voiceRef: voice.ref, phase, outcome });
    op.stream.close();
    return outcome;
  }

  /**
   * Run an operation body so that the returned promise never rejects and
   * the operation always reaches a terminal phase. The body starts
   * synchronously, so the voice is already Resolving when install() returns.
   */
  private settle(
    op: OperationState,
    voice: VoiceEntry,
    body: () => Promise<InstallOutcome>
  ): Promise<InstallOutcome> {
    return body().catch((error: unknown) => {
      logger.error(`Unexpected error during ${op.kind} of ${voice.ref}:`, error);
      return this.fail(op, voice, error);
    });
  }

  private voiceTarget(voice: VoiceEntry): BundleTarget {
    return { ref: voice.ref, origin: voice.origin };
  }

  private providerTarget(voice: VoiceEntry): BundleTarget {
    return { ref: voice.providerRef, origin: voice.origin };
  }
}
