import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('BundleLockMap');

/**
 * What a bundle operation is doing
 */
export type BundleOperationKind = 'install' | 'uninstall';

/**
 * Handle for an in-flight operation on one bundle reference
 */
export interface InFlightOperation {
  ref: string;
  kind: BundleOperationKind;
  startedAt: Date;
  /** Settles when the operation finishes; rejects with its error */
  done: Promise<void>;
}

/**
 * Keyed mutual exclusion: at most one operation per bundle reference,
 * system-wide. Owned by the install orchestrator, queried by the resolver.
 */
export class BundleLockMap {
  private inFlight: Map<string, InFlightOperation> = new Map();

  /**
   * The operation currently holding `ref`, if any
   */
  get(ref: string): InFlightOperation | undefined {
    return this.inFlight.get(ref);
  }

  /**
   * Run `work` while holding `ref`.
   *
   * If another operation already holds the reference, its promise is
   * returned instead and `work` is not called. The caller can tell the
   * two apart with `joined`.
   */
  run(
    ref: string,
    kind: BundleOperationKind,
    work: () => Promise<void>
  ): { done: Promise<void>; joined: boolean } {
    const existing = this.inFlight.get(ref);
    if (existing) {
      logger.debug(`Joining in-flight ${existing.kind} of ${ref}`);
      return { done: existing.done, joined: true };
    }

    const done = Promise.resolve()
      .then(work)
      .finally(() => {
        if (this.inFlight.get(ref)?.done === done) {
          this.inFlight.delete(ref);
          logger.debug(`Released ${ref}`);
        }
      });

    this.inFlight.set(ref, { ref, kind, startedAt: new Date(), done });
    logger.debug(`Acquired ${ref} for ${kind}`);

    return { done, joined: false };
  }

  /**
   * References currently held
   */
  heldRefs(): string[] {
    return Array.from(this.inFlight.keys());
  }
}
