import { describe, expect, it } from 'vitest';
import { InstallOrchestrator } from '../../src/core/install/InstallOrchestrator.js';
import type { InstallOperation } from '../../src/core/install/InstallOrchestrator.js';
import { InstallStateStore } from '../../src/core/state/InstallStateStore.js';
import { InstallEventBus } from '../../src/core/events/InstallEventBus.js';
import { ProviderRefreshCoordinator } from '../../src/core/refresh/ProviderRefreshCoordinator.js';
import { CatalogFetcher, buildSnapshot } from '../../src/core/catalog/CatalogFetcher.js';
import type { InstallPhase, InstallStreamEvent } from '../../src/types/install-events.types.js';
import type { VoiceEntry } from '../../src/types/voice.types.js';
import {
  FakeBundleManager,
  FakeProviderBus,
  SAMPLE_PROVIDER_REF,
  SAMPLE_VOICE_REF,
  flush,
  providerComponent,
  sampleIndex,
  voiceComponent,
} from '../helpers/fakes.js';

const SECOND_VOICE_REF = 'en-second';

async function setup(installed: string[] = []) {
  const index = sampleIndex([
    providerComponent(),
    voiceComponent(),
    voiceComponent({ id: 'org.sample.Speech.Provider.Voice.EnSecond', bundle: SECOND_VOICE_REF, name: 'Second' }),
  ]);
  const bundleManager = new FakeBundleManager(index, installed);
  const providers = new FakeProviderBus();
  const events = new InstallEventBus();
  const store = new InstallStateStore(events);
  const voices = await new CatalogFetcher(bundleManager).fetchCatalog();
  store.populate(buildSnapshot(voices), await bundleManager.queryInstalledSet());

  const orchestrator = new InstallOrchestrator({
    bundleManager,
    store,
    events,
    refresher: new ProviderRefreshCoordinator(providers, providers, { timeoutMs: 20 }),
  });

  const voice = (ref: string): VoiceEntry => {
    const entry = store.getVoice(ref);
    if (!entry) throw new Error(`no voice ${ref}`);
    return entry;
  };

  return { bundleManager, providers, events, store, orchestrator, voice };
}

async function collect(operation: InstallOperation): Promise<InstallStreamEvent[]> {
  const events: InstallStreamEvent[] = [];
  for await (const event of operation.events) {
    events.push(event);
  }
  return events;
}

function phases(events: InstallStreamEvent[]): InstallPhase[] {
  return events.filter(e => e.type === 'phase').map(e => e.phase);
}

describe('InstallOrchestrator', () => {
  it('installs the provider before the voice', async () => {
    const { bundleManager, orchestrator, store, voice } = await setup();

    const operation = orchestrator.install(voice(SAMPLE_VOICE_REF));
    const events = await collect(operation);

    expect(phases(events)).toEqual(['Resolving', 'InstallingProvider', 'InstallingVoice', 'Refreshing', 'Done']);
    expect(bundleManager.installCalls).toEqual([SAMPLE_PROVIDER_REF, SAMPLE_VOICE_REF]);
    expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({ kind: 'Installed' });
    expect(await operation.result).toEqual({ kind: 'Installed', refresh: { kind: 'Success', refreshed: [] } });
  });

  it('reports Resolving as soon as install() returns', async () => {
    const { orchestrator, store, voice } = await setup();

    const operation = orchestrator.install(voice(SAMPLE_VOICE_REF));

    expect(operation.phase).toBe('Resolving');
    expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({ kind: 'Installing', phase: 'resolving' });
    await operation.result;
  });

  it('skips the provider step when the provider is installed', async () => {
    const { bundleManager, orchestrator, voice } = await setup([SAMPLE_PROVIDER_REF]);

    const events = await collect(orchestrator.install(voice(SAMPLE_VOICE_REF)));

    expect(phases(events)).toEqual(['Resolving', 'InstallingVoice', 'Refreshing', 'Done']);
    expect(bundleManager.installCalls).toEqual([SAMPLE_VOICE_REF]);
  });

  it('finishes without any step when the voice is already installed', async () => {
    const { bundleManager, orchestrator, voice } = await setup([SAMPLE_PROVIDER_REF, SAMPLE_VOICE_REF]);

    const events = await collect(orchestrator.install(voice(SAMPLE_VOICE_REF)));

    expect(phases(events)).toEqual(['Resolving', 'Done']);
    expect(bundleManager.installCalls).toEqual([]);
  });

  it('never attempts the voice when the provider install fails', async () => {
    const { bundleManager, orchestrator, store, voice } = await setup();
    bundleManager.failures.set(SAMPLE_PROVIDER_REF, new Error('network error'));

    const operation = orchestrator.install(voice(SAMPLE_VOICE_REF));
    const events = await collect(operation);

    expect(phases(events)).toEqual(['Resolving', 'InstallingProvider', 'Failed']);
    expect(bundleManager.installCalls).toEqual([SAMPLE_PROVIDER_REF]);
    expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({
      kind: 'Failed',
      reason: 'ProviderInstallFailed',
      message: 'network error',
    });
  });

  it('keeps the provider when the voice install fails', async () => {
    const { bundleManager, orchestrator, store, voice } = await setup();
    bundleManager.failures.set(SAMPLE_VOICE_REF, new Error('checksum mismatch'));

    const outcome = await orchestrator.install(voice(SAMPLE_VOICE_REF)).result;

    expect(outcome).toEqual({ kind: 'Failed', reason: 'VoiceInstallFailed', message: 'checksum mismatch' });
    expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({
      kind: 'Failed',
      reason: 'VoiceInstallFailed',
      message: 'checksum mismatch',
    });
    expect(bundleManager.uninstallCalls).toEqual([]);
    expect(await orchestrator.resolver.resolve(voice(SAMPLE_VOICE_REF))).toEqual(['InstallVoice']);
  });

  it('fails with ResolutionFailed when the installed set cannot be read', async () => {
    const { bundleManager, orchestrator, voice } = await setup();
    bundleManager.installedSetError = new Error('permission denied');

    const outcome = await orchestrator.install(voice(SAMPLE_VOICE_REF)).result;

    expect(outcome).toEqual({ kind: 'Failed', reason: 'ResolutionFailed', message: 'permission denied' });
    expect(bundleManager.installCalls).toEqual([]);
  });

  it('installs a shared provider once for concurrent voices', async () => {
    const { bundleManager, orchestrator, store, voice } = await setup();
    const gate = bundleManager.gate(SAMPLE_PROVIDER_REF);

    const first = orchestrator.install(voice(SAMPLE_VOICE_REF));
    await flush();
    expect(first.phase).toBe('InstallingProvider');

    expect(await orchestrator.resolver.resolve(voice(SECOND_VOICE_REF))).toEqual(['WaitForProvider', 'InstallVoice']);

    const second = orchestrator.install(voice(SECOND_VOICE_REF));
    await flush();
    expect(second.phase).toBe('InstallingProvider');

    gate.resolve();
    const [secondEvents] = await Promise.all([collect(second), first.result]);

    expect(phases(secondEvents)).toEqual(['Resolving', 'InstallingProvider', 'InstallingVoice', 'Refreshing', 'Done']);
    expect(bundleManager.installCalls.filter(ref => ref === SAMPLE_PROVIDER_REF)).toHaveLength(1);
    expect([...bundleManager.installCalls].sort()).toEqual([SECOND_VOICE_REF, SAMPLE_VOICE_REF, SAMPLE_PROVIDER_REF].sort());
    expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({ kind: 'Installed' });
    expect(store.getStatus(SECOND_VOICE_REF)).toEqual({ kind: 'Installed' });
  });

  it('fails every voice waiting on a provider install that fails', async () => {
    const { bundleManager, orchestrator, voice } = await setup();
    const gate = bundleManager.gate(SAMPLE_PROVIDER_REF);
    bundleManager.failures.set(SAMPLE_PROVIDER_REF, new Error('remote gone'));

    const first = orchestrator.install(voice(SAMPLE_VOICE_REF));
    await flush();
    const second = orchestrator.install(voice(SECOND_VOICE_REF));
    await flush();

    gate.resolve();

    expect(await first.result).toEqual({ kind: 'Failed', reason: 'ProviderInstallFailed', message: 'remote gone' });
    expect(await second.result).toEqual({ kind: 'Failed', reason: 'ProviderInstallFailed', message: 'remote gone' });
    expect(bundleManager.installCalls).toEqual([SAMPLE_PROVIDER_REF]);
  });

  it('returns the in-flight operation for a repeated request', async () => {
    const { orchestrator, voice } = await setup();

    const first = orchestrator.install(voice(SAMPLE_VOICE_REF));
    const again = orchestrator.install(voice(SAMPLE_VOICE_REF));

    expect(again).toBe(first);
    await first.result;
  });

  describe('cancellation', () => {
    it('halts after the provider step and leaves ProviderOnly', async () => {
      const { bundleManager, orchestrator, store, voice } = await setup();
      const gate = bundleManager.gate(SAMPLE_PROVIDER_REF);

      const operation = orchestrator.install(voice(SAMPLE_VOICE_REF));
      await flush();
      expect(operation.phase).toBe('InstallingProvider');

      expect(operation.cancel()).toBe(true);
      gate.resolve();
      const events = await collect(operation);

      expect(phases(events)).toEqual(['Resolving', 'InstallingProvider', 'Cancelled']);
      expect(bundleManager.installCalls).toEqual([SAMPLE_PROVIDER_REF]);
      expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({ kind: 'ProviderOnly' });
      expect(await operation.result).toEqual({ kind: 'Cancelled', status: { kind: 'ProviderOnly' } });
    });

    it('stops before any step when cancelled while resolving', async () => {
      const { bundleManager, orchestrator, store, voice } = await setup();

      const operation = orchestrator.install(voice(SAMPLE_VOICE_REF));
      expect(orchestrator.cancel(SAMPLE_VOICE_REF)).toBe(true);

      expect(await operation.result).toEqual({ kind: 'Cancelled', status: { kind: 'Unavailable' } });
      expect(bundleManager.installCalls).toEqual([]);
      expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({ kind: 'Unavailable' });
    });

    it('is refused once the voice step has started', async () => {
      const { bundleManager, orchestrator, store, voice } = await setup([SAMPLE_PROVIDER_REF]);
      const gate = bundleManager.gate(SAMPLE_VOICE_REF);

      const operation = orchestrator.install(voice(SAMPLE_VOICE_REF));
      await flush();
      expect(operation.phase).toBe('InstallingVoice');

      expect(operation.cancel()).toBe(false);
      gate.resolve();

      expect((await operation.result).kind).toBe('Installed');
      expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({ kind: 'Installed' });
    });

    it('is refused when nothing is in flight', async () => {
      const { orchestrator } = await setup();

      expect(orchestrator.cancel(SAMPLE_VOICE_REF)).toBe(false);
    });
  });

  describe('provider refresh', () => {
    it('keeps the voice installed when some providers do not acknowledge', async () => {
      const { orchestrator, providers, store, voice } = await setup([SAMPLE_PROVIDER_REF]);
      providers.running.set(SAMPLE_PROVIDER_REF, [{ name: SAMPLE_PROVIDER_REF }, { name: `${SAMPLE_PROVIDER_REF}.Second` }]);
      providers.silent.add(`${SAMPLE_PROVIDER_REF}.Second`);

      const outcome = await orchestrator.install(voice(SAMPLE_VOICE_REF)).result;

      expect(outcome.kind).toBe('Installed');
      expect(outcome.kind === 'Installed' ? outcome.refresh?.kind : null).toBe('PartialFailure');
      expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({ kind: 'Installed' });
    });

    it('refreshes the provider of the installed voice and publishes the result', async () => {
      const { events, orchestrator, providers, voice } = await setup([SAMPLE_PROVIDER_REF]);
      providers.running.set(SAMPLE_PROVIDER_REF, [{ name: SAMPLE_PROVIDER_REF, pid: 4242 }]);
      const published: string[] = [];
      events.on('provider:refreshed', 'test', ({ data }) => {
        published.push(`${data.providerRef}:${data.result.kind}`);
      });

      await orchestrator.install(voice(SAMPLE_VOICE_REF)).result;

      expect(providers.listCalls).toEqual([SAMPLE_PROVIDER_REF]);
      expect(providers.reloads).toEqual([SAMPLE_PROVIDER_REF]);
      expect(published).toEqual([`${SAMPLE_PROVIDER_REF}:Success`]);
    });
  });

  it('streams advisory progress without changing the phase sequence', async () => {
    const { bundleManager, events: bus, orchestrator, voice } = await setup([SAMPLE_PROVIDER_REF]);
    bundleManager.progress.set(SAMPLE_VOICE_REF, [{ percent: 40 }, { percent: 100 }]);
    const fed: Array<number | undefined> = [];
    bus.on('voice:changed', 'test', ({ data }) => {
      fed.push(data.progress?.percent);
    });

    const events = await collect(orchestrator.install(voice(SAMPLE_VOICE_REF)));

    expect(events.filter(e => e.type === 'progress')).toEqual([
      { type: 'progress', voiceRef: SAMPLE_VOICE_REF, phase: 'InstallingVoice', progress: { percent: 40 } },
      { type: 'progress', voiceRef: SAMPLE_VOICE_REF, phase: 'InstallingVoice', progress: { percent: 100 } },
    ]);
    expect(phases(events)).toEqual(['Resolving', 'InstallingVoice', 'Refreshing', 'Done']);
    expect(fed).toEqual([undefined, undefined, 40, 100, undefined, undefined]);
  });

  describe('uninstall', () => {
    it('removes the voice, keeps the provider and refreshes it', async () => {
      const { bundleManager, orchestrator, providers, store, voice } = await setup([SAMPLE_PROVIDER_REF, SAMPLE_VOICE_REF]);

      const operation = orchestrator.uninstall(voice(SAMPLE_VOICE_REF));
      const events = await collect(operation);

      expect(phases(events)).toEqual(['Uninstalling', 'Refreshing', 'Done']);
      expect(bundleManager.uninstallCalls).toEqual([SAMPLE_VOICE_REF]);
      expect(providers.listCalls).toEqual([SAMPLE_PROVIDER_REF]);
      expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({ kind: 'ProviderOnly' });
      expect(await operation.result).toEqual({ kind: 'Uninstalled', refresh: { kind: 'Success', refreshed: [] } });
    });

    it('returns to Installed when removal fails', async () => {
      const { bundleManager, orchestrator, store, voice } = await setup([SAMPLE_PROVIDER_REF, SAMPLE_VOICE_REF]);
      bundleManager.failures.set(SAMPLE_VOICE_REF, new Error('in use'));

      const operation = orchestrator.uninstall(voice(SAMPLE_VOICE_REF));
      const events = await collect(operation);

      expect(phases(events)).toEqual(['Uninstalling', 'Failed']);
      expect(store.getStatus(SAMPLE_VOICE_REF)).toEqual({ kind: 'Installed' });
      expect(await operation.result).toEqual({
        kind: 'Failed',
        reason: 'UninstallFailed',
        message: 'in use',
      });
    });
  });
});
