import { spawn } from 'child_process';
import { isSandboxed, parseCommandPrefix } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('HostCommand');

/**
 * Error thrown when a host command exits unsuccessfully
 */
export class CommandError extends Error {
  constructor(
    public readonly command: string[],
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    const tail = stderr.trim().split('\n').slice(-3).join(' | ');
    super(`${command.join(' ')} exited with code ${exitCode ?? 'null'}${tail ? `: ${tail}` : ''}`);
    this.name = 'CommandError';
  }
}

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Receives stdout as it arrives, chunk by chunk */
  onStdout?: (chunk: string) => void;
  /** Kills the command when aborted */
  signal?: AbortSignal;
}

/**
 * Runs commands on the host. Inside a Flatpak sandbox every command is
 * routed through `flatpak-spawn --host`.
 */
export interface CommandRunner {
  /** Resolves with the exit status; rejects only if the command could not be started */
  run(args: string[], options?: RunOptions): Promise<CommandResult>;
}

export class HostCommandRunner implements CommandRunner {
  private prefix: string[];

  constructor(prefix: string[] = []) {
    this.prefix = prefix;
  }

  /**
   * Build a runner with the configured prefix, or detect the sandbox.
   * Inside a sandbox the prefix is only kept if it works.
   */
  static async create(): Promise<HostCommandRunner> {
    const configured = parseCommandPrefix();
    if (configured) {
      return new HostCommandRunner(configured);
    }

    if (!isSandboxed()) {
      return new HostCommandRunner();
    }

    const candidate = new HostCommandRunner(['flatpak-spawn', '--host']);
    try {
      const probe = await candidate.run(['which', 'which']);
      if (probe.code === 0) {
        logger.info('Running host commands through flatpak-spawn');
        return candidate;
      }
    } catch (error) {
      logger.debug('flatpak-spawn is not usable:', error);
    }

    logger.warn('Sandboxed but flatpak-spawn --host does not work; running commands directly');
    return new HostCommandRunner();
  }

  run(args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const command = [...this.prefix, ...args];
    const [file, ...rest] = command;
    if (!file) {
      return Promise.reject(new Error('Empty command'));
    }

    logger.debug(`$ ${command.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(file, rest, { stdio: ['ignore', 'pipe', 'pipe'], signal: options.signal });
      let stdout = '';
      let stderr = '';

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');

      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
        options.onStdout?.(chunk);
      });

      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('close', (code) => {
        resolve({ code, stdout, stderr });
      });

      child.on('error', (error) => {
        if (options.signal?.aborted) {
          reject(new Error(`${command.join(' ')} was aborted`));
          return;
        }
        reject(new Error(`Failed to spawn ${file}: ${error.message}`));
      });
    });
  }
}

/**
 * Run a command and reject with CommandError on a non-zero exit
 */
export async function runChecked(runner: CommandRunner, args: string[], options?: RunOptions): Promise<string> {
  const result = await runner.run(args, options);
  if (result.code !== 0) {
    throw new CommandError(args, result.code, result.stderr);
  }
  return result.stdout;
}
