/**
 * Event payload types published on the install event bus.
 *
 * Event naming convention: `area:event-name`
 * Type naming convention: `AreaEventNameEvent`
 */

import type { FailureReason, InstallProgress, InstallStatus } from './voice.types.js';
import type { ServiceInstance } from './bundle.types.js';

// ==================== Install state machine ====================

/**
 * States of one voice's install (or uninstall) run
 */
export type InstallPhase =
  | 'Idle'
  | 'Resolving'
  | 'InstallingProvider'
  | 'InstallingVoice'
  | 'Refreshing'
  | 'Uninstalling'
  | 'Done'
  | 'Failed'
  | 'Cancelled';

// ==================== Provider refresh ====================

export interface UnreachableInstance {
  instance: ServiceInstance;
  /** 'timeout' when no acknowledgment arrived in time */
  reason: 'timeout' | 'unreachable';
  message: string;
}

export type RefreshResult =
  | { kind: 'Success'; refreshed: ServiceInstance[] }
  | { kind: 'PartialFailure'; refreshed: ServiceInstance[]; unreachable: UnreachableInstance[] };

// ==================== Outcomes ====================

export type InstallOutcome =
  | { kind: 'Installed'; refresh: RefreshResult | null }
  | { kind: 'Uninstalled'; refresh: RefreshResult | null }
  | { kind: 'Failed'; reason: FailureReason; message: string }
  | { kind: 'Cancelled'; status: InstallStatus };

/**
 * One element of an install stream
 */
export type InstallStreamEvent =
  | { type: 'phase'; voiceRef: string; phase: InstallPhase; outcome?: InstallOutcome }
  | { type: 'progress'; voiceRef: string; phase: InstallPhase; progress: InstallProgress };

// ==================== Bus events ====================

/**
 * Emitted whenever a voice's status or progress changes. This is the UI feed.
 * Event: `voice:changed`
 */
export interface VoiceChangedEvent {
  voiceRef: string;
  status: InstallStatus;
  /** State-machine phase of the operation that caused the change ('Idle' outside of one) */
  phase: InstallPhase;
  progress?: InstallProgress;
}

/**
 * Emitted after each catalog fetch, successful or not
 * Event: `catalog:updated`
 */
export interface CatalogUpdatedEvent {
  voiceCount: number;
  providerCount: number;
  error?: string;
}

/**
 * Emitted after running providers were asked to reload their voices
 * Event: `provider:refreshed`
 */
export interface ProviderRefreshedEvent {
  providerRef: string;
  result: RefreshResult;
}

// ==================== Event Name Constants ====================

/**
 * Constants for event names to avoid typos
 */
export const INSTALL_EVENTS = {
  VOICE_CHANGED: 'voice:changed',
  CATALOG_UPDATED: 'catalog:updated',
  PROVIDER_REFRESHED: 'provider:refreshed',
} as const;

/**
 * Payload type for each event name
 */
export interface InstallEventMap {
  'voice:changed': VoiceChangedEvent;
  'catalog:updated': CatalogUpdatedEvent;
  'provider:refreshed': ProviderRefreshedEvent;
}

export type InstallEventName = keyof InstallEventMap;
