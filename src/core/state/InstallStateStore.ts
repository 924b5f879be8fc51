import type { CatalogSnapshot, InstallStatus, VoiceEntry } from '../../types/voice.types.js';
import { isBusy } from '../../types/voice.types.js';
import type { InstallPhase } from '../../types/install-events.types.js';
import { INSTALL_EVENTS } from '../../types/install-events.types.js';
import type { InstallEventBus } from '../events/InstallEventBus.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('InstallStateStore');

const SOURCE = 'state-store';

/**
 * Status of a voice as implied by the bundle manager's installed set
 */
export function derivedStatus(voice: VoiceEntry, installed: ReadonlySet<string>): InstallStatus {
  if (installed.has(voice.ref)) return { kind: 'Installed' };
  if (installed.has(voice.providerRef)) return { kind: 'ProviderOnly' };
  return { kind: 'Unavailable' };
}

function sameStatus(a: InstallStatus, b: InstallStatus): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * In-memory record of the catalog and each voice's status.
 *
 * Only the install orchestrator writes statuses during an operation;
 * everyone else reads. Reads return the latest value and never wait,
 * so an observer may see an intermediate Installing phase.
 */
export class InstallStateStore {
  private snapshot: CatalogSnapshot = { voices: [], providers: [], languages: [] };
  private voices: Map<string, VoiceEntry> = new Map();
  private statuses: Map<string, InstallStatus> = new Map();
  private events: InstallEventBus;

  constructor(events: InstallEventBus) {
    this.events = events;
  }

  /**
   * Replace the whole catalog. Statuses start from the installed set,
   * except for voices with an operation in flight, which keep theirs.
   */
  populate(snapshot: CatalogSnapshot, installed: ReadonlySet<string>): void {
    const previous = this.statuses;
    this.snapshot = snapshot;
    this.voices = new Map(snapshot.voices.map(v => [v.ref, v]));
    this.statuses = new Map();

    for (const voice of snapshot.voices) {
      const current = previous.get(voice.ref);
      this.statuses.set(voice.ref, current && isBusy(current) ? current : derivedStatus(voice, installed));
    }

    logger.debug(`Populated ${this.voices.size} voice(s)`);
  }

  getCatalog(): CatalogSnapshot {
    return this.snapshot;
  }

  getVoice(voiceRef: string): VoiceEntry | undefined {
    return this.voices.get(voiceRef);
  }

  getStatus(voiceRef: string): InstallStatus | undefined {
    return this.statuses.get(voiceRef);
  }

  /**
   * Set a voice's status and publish the change.
   * Unchanged statuses are not re-published.
   */
  setStatus(voiceRef: string, status: InstallStatus, phase: InstallPhase = 'Idle'): void {
    if (!this.voices.has(voiceRef)) {
      logger.warn(`Ignoring status for unknown voice ${voiceRef}`);
      return;
    }

    const previous = this.statuses.get(voiceRef);
    if (previous && sameStatus(previous, status)) {
      return;
    }

    this.statuses.set(voiceRef, status);
    logger.debug(`${voiceRef}: ${previous?.kind ?? 'none'} -> ${status.kind}`);

    this.events.publish(INSTALL_EVENTS.VOICE_CHANGED, SOURCE, {
      voiceRef,
      status,
      phase,
      progress: status.kind === 'Installing' ? status.progress : undefined,
    });
  }

  /**
   * Re-derive statuses after the installed set changed outside of an operation.
   * Voices with an operation in flight are left alone.
   */
  syncInstalled(installed: ReadonlySet<string>): void {
    for (const voice of this.snapshot.voices) {
      const current = this.statuses.get(voice.ref);
      if (current && isBusy(current)) continue;
      // A failure badge stays until the voice actually shows up as installed
      if (current?.kind === 'Failed' && !installed.has(voice.ref)) continue;

      this.setStatus(voice.ref, derivedStatus(voice, installed));
    }
  }
}
