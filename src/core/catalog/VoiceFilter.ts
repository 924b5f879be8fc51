import type { VoiceEntry } from '../../types/voice.types.js';

/**
 * Browse filters. Unset fields match everything.
 */
export interface VoiceFilterCriteria {
  /** Only voices for this provider */
  providerRef?: string;

  /** Language name as listed in the catalog snapshot (e.g. "English") */
  language?: string;

  /** Case-insensitive search over voice, provider and language names */
  text?: string;
}

function buildMatcher(text: string): (haystack: string) => boolean {
  try {
    const pattern = new RegExp(text, 'i');
    return haystack => pattern.test(haystack);
  } catch {
    // Not a valid pattern: plain substring search
    const needle = text.toLowerCase();
    return haystack => haystack.toLowerCase().includes(needle);
  }
}

export function matchesFilter(voice: VoiceEntry, criteria: VoiceFilterCriteria): boolean {
  if (criteria.providerRef && voice.providerRef !== criteria.providerRef) {
    return false;
  }

  if (criteria.language && !voice.languageNames.includes(criteria.language)) {
    return false;
  }

  if (criteria.text) {
    const tokens = [voice.name, voice.providerName, ...voice.languageAndRegionNames];
    return buildMatcher(criteria.text)(tokens.join(' '));
  }

  return true;
}

/**
 * Voices matching all given criteria, catalog order preserved
 */
export function filterVoices(voices: readonly VoiceEntry[], criteria: VoiceFilterCriteria): VoiceEntry[] {
  return voices.filter(voice => matchesFilter(voice, criteria));
}
