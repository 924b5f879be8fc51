import { readFileSync } from 'fs';
import { gzipSync } from 'zlib';
import { describe, expect, it } from 'vitest';
import { bundleId, parseAppStreamCatalog, parseCompressedCatalog } from '../../src/core/flatpak/appstream.js';

const SAMPLE_APPSTREAM = readFileSync(new URL('../fixtures/appstream.xml', import.meta.url), 'utf8');

describe('parseAppStreamCatalog', () => {
  it('reads ids, names, languages, extends and download size', () => {
    const [provider, voice] = parseAppStreamCatalog(SAMPLE_APPSTREAM);

    expect(provider).toEqual({
      id: 'org.sample.Speech.Provider',
      bundle: 'org.sample.Speech.Provider',
      name: 'Sample TTS',
      summary: undefined,
      languages: [],
      extends: [],
      downloadSize: undefined,
    });
    expect(voice).toEqual({
      id: 'org.sample.Speech.Provider.Voice.EnSample',
      bundle: 'org.sample.Speech.Provider.Voice.EnSample',
      name: 'Sample English',
      summary: 'A sample voice',
      languages: ['en_US'],
      extends: ['org.sample.Speech.Provider'],
      downloadSize: 2048,
    });
  });

  it('reads a catalog with a single component', () => {
    const xml = '<components><component><id>org.single.App</id></component></components>';

    expect(parseAppStreamCatalog(xml).map(c => [c.id, c.name])).toEqual([['org.single.App', 'org.single.App']]);
  });

  it('skips components without an id', () => {
    const xml = '<components><component><name>Nameless</name></component><component><id>org.ok.App</id></component></components>';

    expect(parseAppStreamCatalog(xml).map(c => c.id)).toEqual(['org.ok.App']);
  });

  it('rejects documents that are not catalogs', () => {
    expect(() => parseAppStreamCatalog('<feed><entry/></feed>')).toThrow('Not an AppStream catalog');
  });

  it('reads gzip-compressed catalogs', () => {
    const components = parseCompressedCatalog(gzipSync(Buffer.from(SAMPLE_APPSTREAM, 'utf8')));

    expect(components.map(c => c.id)).toEqual([
      'org.sample.Speech.Provider',
      'org.sample.Speech.Provider.Voice.EnSample',
    ]);
  });
});

describe('bundleId', () => {
  it('extracts the id from a full ref', () => {
    expect(bundleId('runtime/org.sample.Voice/x86_64/stable')).toBe('org.sample.Voice');
  });

  it('returns anything else unchanged', () => {
    expect(bundleId('org.sample.Voice')).toBe('org.sample.Voice');
  });
});
