import { readFileSync } from 'fs';
import { gzipSync } from 'zlib';
import { describe, expect, it } from 'vitest';
import {
  FlatpakBundleManager,
  parseInstalledApplications,
  parseProgress,
  parseRemotes,
} from '../../src/core/flatpak/FlatpakBundleManager.js';
import { CommandError } from '../../src/core/host/HostCommandRunner.js';
import type { BundleTarget } from '../../src/types/bundle.types.js';
import type { InstallProgress } from '../../src/types/voice.types.js';
import { FakeCommandRunner } from '../helpers/fakes.js';

const APPSTREAM = gzipSync(readFileSync(new URL('../fixtures/appstream.xml', import.meta.url)));

const VOICE_TARGET: BundleTarget = {
  ref: 'org.sample.Speech.Provider.Voice.EnSample',
  origin: { installation: 'user', remote: 'samples' },
};

function setup() {
  const runner = new FakeCommandRunner();
  const reads: string[] = [];
  const manager = new FlatpakBundleManager({
    runner,
    installations: ['user'],
    binary: 'flatpak',
    arch: 'x86_64',
    readAppStream: async (path) => {
      reads.push(path);
      if (path === manager.appStreamPath('user', 'samples')) return APPSTREAM;
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
    },
  });
  return { runner, reads, manager };
}

describe('parseRemotes', () => {
  it('reads name, url and the disabled option', () => {
    const output = 'samples\thttps://repo.example.test/samples\t\nold\thttps://old.example.test\tdisabled,no-enumerate\n';

    expect(parseRemotes(output)).toEqual([
      { name: 'samples', url: 'https://repo.example.test/samples', disabled: false },
      { name: 'old', url: 'https://old.example.test', disabled: true },
    ]);
  });
});

describe('parseInstalledApplications', () => {
  it('drops blank lines and the header', () => {
    expect(parseInstalledApplications('Application ID\norg.a.App\n\norg.b.App\n')).toEqual(['org.a.App', 'org.b.App']);
  });
});

describe('parseProgress', () => {
  it('returns the last percentage in a chunk', () => {
    expect(parseProgress('Downloading 12% ... 47%')).toBe(47);
  });

  it('ignores chunks without a valid percentage', () => {
    expect(parseProgress('Looking for matches…')).toBeNull();
    expect(parseProgress('250%')).toBeNull();
  });
});

describe('FlatpakBundleManager', () => {
  it('builds the remote index from remotes and their appstream data', async () => {
    const { runner, manager } = setup();
    runner.on('flatpak remotes --user --columns=name,url,options', {
      result: { stdout: 'samples\thttps://repo.example.test/samples\t\nempty\thttps://empty.example.test\t\n' },
    });

    const index = await manager.queryRemoteIndex();

    expect(index.remotes).toHaveLength(1);
    expect(index.remotes[0]).toMatchObject({
      name: 'samples',
      url: 'https://repo.example.test/samples',
      disabled: false,
      origin: { installation: 'user', remote: 'samples' },
    });
    expect(index.remotes[0]?.components.map(c => c.id)).toEqual([
      'org.sample.Speech.Provider',
      'org.sample.Speech.Provider.Voice.EnSample',
    ]);
  });

  it('fails when the remotes cannot be listed', async () => {
    const { manager } = setup();

    await expect(manager.queryRemoteIndex()).rejects.toBeInstanceOf(CommandError);
  });

  it('passes on read failures other than a missing file, whatever was thrown', async () => {
    const runner = new FakeCommandRunner();
    runner.on('flatpak remotes --user --columns=name,url,options', {
      result: { stdout: 'samples\thttps://repo.example.test/samples\t\n' },
    });
    const manager = new FlatpakBundleManager({
      runner,
      installations: ['user'],
      binary: 'flatpak',
      arch: 'x86_64',
      readAppStream: () => Promise.reject('disk unplugged'),
    });

    await expect(manager.queryRemoteIndex()).rejects.toBe('disk unplugged');
  });

  it('reads the installed set', async () => {
    const { runner, manager } = setup();
    runner.on('flatpak list --user --columns=application', {
      result: { stdout: 'org.sample.Speech.Provider\norg.sample.Speech.Provider.Voice.EnSample\n' },
    });

    expect([...(await manager.queryInstalledSet())]).toEqual([
      'org.sample.Speech.Provider',
      'org.sample.Speech.Provider.Voice.EnSample',
    ]);
  });

  it('installs from the origin remote and reports distinct progress', async () => {
    const { runner, manager } = setup();
    const command = 'flatpak install --user --noninteractive -y samples org.sample.Speech.Provider.Voice.EnSample';
    runner.on(command, { chunks: ['Installing 10%', '10%', 'Downloading 55% 80%'] });
    const progress: InstallProgress[] = [];

    await manager.install(VOICE_TARGET, { onProgress: p => progress.push(p) });

    expect(runner.calls.map(args => args.join(' '))).toEqual([command]);
    expect(progress).toEqual([{ percent: 10 }, { percent: 80 }]);
  });

  it('rejects with CommandError when the install exits non-zero', async () => {
    const { runner, manager } = setup();
    runner.on('flatpak install --user --noninteractive -y samples org.sample.Speech.Provider.Voice.EnSample', {
      result: { code: 1, stderr: 'error: Unable to connect to remote\n' },
    });

    await expect(manager.install(VOICE_TARGET)).rejects.toThrow(
      'flatpak install --user --noninteractive -y samples org.sample.Speech.Provider.Voice.EnSample exited with code 1: error: Unable to connect to remote'
    );
  });

  it('uninstalls from the installation the bundle came from', async () => {
    const { runner, manager } = setup();
    const command = 'flatpak uninstall --user --noninteractive -y org.sample.Speech.Provider.Voice.EnSample';
    runner.on(command, {});

    await manager.uninstall(VOICE_TARGET);

    expect(runner.calls.map(args => args.join(' '))).toEqual([command]);
  });
});
