/**
 * Command implementations for the voice-installer CLI
 */

import { parseArgs } from 'util';
import type { VoiceInstaller } from './core/VoiceInstaller.js';
import type { InstallOperation } from './core/install/InstallOrchestrator.js';
import type { InstallStreamEvent } from './types/install-events.types.js';
import { describeStatus } from './types/voice.types.js';
import type { VoiceEntry } from './types/voice.types.js';
import { formatBytes } from './shared/utils/time.js';

export const USAGE = `Usage: voice-installer <command> [options]

Commands:
  list [--provider REF] [--language NAME] [--search TEXT]   List voices
  providers                                                 List speech providers
  languages                                                 List languages
  install <voice-ref>                                       Install a voice and its provider
  uninstall <voice-ref>                                     Remove a voice
  watch                                                     Print status changes until interrupted
`;

function formatVoice(installer: VoiceInstaller, voice: VoiceEntry): string {
  const status = installer.getStatus(voice.ref);
  const size = voice.downloadSize === undefined ? '' : `  ${formatBytes(voice.downloadSize)}`;
  return [
    (status ? describeStatus(status) : 'Unknown').padEnd(14),
    voice.ref,
    `${voice.name} (${voice.providerName})`,
    voice.languageAndRegionNames.join(', ') + size,
  ].join('  ');
}

function formatEvent(event: InstallStreamEvent): string {
  if (event.type === 'progress') {
    return `  ${event.phase} ${event.progress.percent ?? '?'}%`;
  }
  if (!event.outcome) {
    return `${event.phase}`;
  }
  switch (event.outcome.kind) {
    case 'Failed':
      return `${event.phase}: ${event.outcome.reason} (${event.outcome.message})`;
    case 'Cancelled':
      return `${event.phase}: left as ${event.outcome.status.kind}`;
    default: {
      const refresh = event.outcome.refresh;
      const note = refresh?.kind === 'PartialFailure'
        ? ' (some running providers were not refreshed; restart apps to see the change)'
        : '';
      return `${event.phase}${note}`;
    }
  }
}

function isParseArgsError(error: unknown): error is TypeError {
  return error instanceof TypeError
    && 'code' in error
    && typeof error.code === 'string'
    && error.code.startsWith('ERR_PARSE_ARGS_');
}

/**
 * Parse command options; null on an unknown option or a missing value
 */
function parseCommandArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      options: {
        provider: { type: 'string' },
        language: { type: 'string' },
        search: { type: 'string' },
      },
    });
  } catch (error) {
    if (isParseArgsError(error)) {
      console.error(error.message);
      return null;
    }
    throw error;
  }
}

/**
 * Print an operation's events and return the exit code
 */
async function follow(operation: InstallOperation): Promise<number> {
  const onInterrupt = () => {
    if (!operation.cancel()) {
      console.log('Too late to cancel, waiting for the operation to finish...');
    }
  };
  process.on('SIGINT', onInterrupt);

  try {
    for await (const event of operation.events) {
      console.log(formatEvent(event));
    }
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  const outcome = await operation.result;
  return outcome.kind === 'Failed' ? 1 : 0;
}

/**
 * Run one command against a started installer and return the exit code
 */
export async function runCommand(installer: VoiceInstaller, command: string, args: string[]): Promise<number> {
  const parsed = parseCommandArgs(args);
  if (!parsed) {
    console.error(USAGE);
    return 2;
  }
  const { values, positionals } = parsed;

  const catalog = installer.getCatalog();
  if (catalog.error) {
    console.warn(`Warning: ${catalog.error}. Showing an empty list; try again later.`);
  }

  switch (command) {
    case 'list': {
      const voices = installer.findVoices({
        providerRef: values.provider,
        language: values.language,
        text: values.search,
      });
      for (const voice of voices) {
        console.log(formatVoice(installer, voice));
      }
      return 0;
    }

    case 'providers':
      for (const provider of catalog.providers) {
        console.log(`${provider.ref}  ${provider.name}`);
      }
      return 0;

    case 'languages':
      for (const language of catalog.languages) {
        console.log(language);
      }
      return 0;

    case 'install':
    case 'uninstall': {
      const [voiceRef] = positionals;
      if (!voiceRef) {
        console.error(USAGE);
        return 2;
      }

      const request = command === 'install'
        ? installer.requestInstall(voiceRef)
        : installer.requestUninstall(voiceRef);

      if (!request.operation) {
        console.log(`${voiceRef}: ${describeStatus(request.status)}`);
        return 0;
      }
      return follow(request.operation);
    }

    case 'watch':
      installer.subscribe('cli', (event) => {
        console.log(`${event.voiceRef}: ${describeStatus(event.status)}`);
      });
      await new Promise<void>(resolve => process.once('SIGINT', () => resolve()));
      return 0;

    default:
      console.error(USAGE);
      return 2;
  }
}
