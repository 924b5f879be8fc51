import { z } from 'zod';
import type { BundleManager, RemoteComponent } from '../../types/bundle.types.js';
import type { CatalogSnapshot, ProviderEntry, VoiceEntry } from '../../types/voice.types.js';
import { env } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';
import { languageDisplayName, languageName, standardizeTag, uniqueSorted } from '../../shared/utils/language.js';

const logger = new Logger('CatalogFetcher');

/**
 * Error thrown when the remote index cannot be read or is malformed
 */
export class CatalogUnavailableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(`Voice catalog unavailable: ${message}`);
    this.name = 'CatalogUnavailableError';
  }
}

const componentSchema = z.object({
  id: z.string().min(1),
  bundle: z.string().min(1).optional(),
  name: z.string(),
  summary: z.string().optional(),
  languages: z.array(z.string()),
  extends: z.array(z.string()),
  downloadSize: z.number().nonnegative().optional(),
});

const remoteIndexSchema = z.object({
  remotes: z.array(
    z.object({
      name: z.string().min(1),
      url: z.string(),
      disabled: z.boolean(),
      origin: z.object({
        installation: z.enum(['system', 'user']),
        remote: z.string().min(1),
      }),
      components: z.array(componentSchema),
    })
  ),
});

export interface CatalogFetcherOptions {
  /** A component is a voice when its id contains this marker */
  voiceMarker?: string;
}

/**
 * Reads the bundle manager's remote index and extracts installable voices
 * together with the provider each one declares it extends.
 */
export class CatalogFetcher {
  private bundleManager: BundleManager;
  private voiceMarker: string;

  constructor(bundleManager: BundleManager, options: CatalogFetcherOptions = {}) {
    this.bundleManager = bundleManager;
    this.voiceMarker = options.voiceMarker ?? env.VOICE_COMPONENT_MARKER;
  }

  /**
   * Fetch the ordered list of installable voices
   * @throws CatalogUnavailableError if the remote is unreachable or the index is malformed
   */
  async fetchCatalog(): Promise<VoiceEntry[]> {
    let raw: unknown;
    try {
      raw = await this.bundleManager.queryRemoteIndex();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CatalogUnavailableError(message, error);
    }

    const parsed = remoteIndexSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid index';
      throw new CatalogUnavailableError(`malformed index (${where})`, parsed.error);
    }

    const visitedUrls = new Set<string>();
    const voices: VoiceEntry[] = [];

    for (const remote of parsed.data.remotes) {
      if (remote.disabled || visitedUrls.has(remote.url)) {
        logger.debug(`Skipping remote ${remote.name} (${remote.disabled ? 'disabled' : 'duplicate url'})`);
        continue;
      }
      visitedUrls.add(remote.url);

      const components = new Map(remote.components.map(c => [c.id, c]));

      for (const component of components.values()) {
        if (!this.isVoice(component)) continue;

        const [providerId] = component.extends;
        const provider = providerId === undefined ? undefined : components.get(providerId);
        if (!provider) {
          logger.warn(`Voice ${component.id} extends unknown provider ${providerId ?? '(none)'}, skipping`);
          continue;
        }

        voices.push(toVoiceEntry(component, provider, remote.origin));
      }
    }

    logger.info(`Catalog contains ${voices.length} voice(s)`);
    return voices;
  }

  private isVoice(component: RemoteComponent): boolean {
    return component.id.includes(this.voiceMarker) && component.extends.length === 1;
  }
}

function toVoiceEntry(
  component: RemoteComponent,
  provider: RemoteComponent,
  origin: VoiceEntry['origin']
): VoiceEntry {
  const languages = component.languages.map(standardizeTag);

  return {
    ref: component.bundle ?? component.id,
    name: component.name,
    summary: component.summary,
    languages,
    locale: languages[0] ?? 'und',
    languageNames: uniqueSorted(languages.map(languageName)),
    languageAndRegionNames: uniqueSorted(languages.map(languageDisplayName)),
    providerRef: provider.bundle ?? provider.id,
    providerName: provider.name,
    downloadSize: component.downloadSize,
    origin: { ...origin },
  };
}

/**
 * Distinct providers required by the given voices, in first-seen order
 */
export function deriveProviders(voices: readonly VoiceEntry[]): ProviderEntry[] {
  const providers = new Map<string, ProviderEntry>();
  for (const voice of voices) {
    if (!providers.has(voice.providerRef)) {
      providers.set(voice.providerRef, {
        ref: voice.providerRef,
        name: voice.providerName,
        origin: voice.origin,
      });
    }
  }
  return Array.from(providers.values());
}

/**
 * Build the UI snapshot for a fetched voice list
 */
export function buildSnapshot(voices: readonly VoiceEntry[], fetchedAt: Date = new Date()): CatalogSnapshot {
  return {
    voices,
    providers: deriveProviders(voices),
    languages: uniqueSorted(voices.flatMap(v => [...v.languageNames])),
    fetchedAt,
  };
}
