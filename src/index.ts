#!/usr/bin/env node
/**
 * voice-installer - browse and install speech voices and their providers
 *
 * Entry point for the command line.
 */

import { startInstaller, stopInstaller } from './app.js';
import { UnknownVoiceError } from './core/VoiceInstaller.js';
import { USAGE, runCommand } from './cli.js';
import { Logger } from './shared/utils/logger.js';

const logger = new Logger('Main');

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);
  if (!command || command === 'help' || command === '--help') {
    console.log(USAGE);
    return;
  }

  try {
    const installer = await startInstaller({ watchInstallations: command === 'watch' });
    process.exitCode = await runCommand(installer, command, args);
  } catch (error) {
    if (error instanceof UnknownVoiceError) {
      console.error(error.message);
      process.exitCode = 2;
    } else {
      logger.error('voice-installer failed:', error);
      process.exitCode = 1;
    }
  } finally {
    await stopInstaller();
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
