import path from 'path';
import type { AppConfig } from '../config';
import type { MeshTool, ProcessResult, ProcessRunner } from '../types';
import { ConversionError, EnvironmentError, TimeoutError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { runProcess } from './processRunner';

export const INPUT_FILENAME = 'input.igs';
export const OUTPUT_FILENAME = 'output.obj';

// `docker run` reserves these for its own failures and for an entrypoint that cannot be run
const RUNTIME_EXIT_CODES = new Set([125, 126, 127]);

export type ContainerToolConfig = Pick<
  AppConfig,
  'containerRuntime' | 'toolImage' | 'toolCommand' | 'mountPoint' | 'timeoutMs' | 'killGraceMs'
>;

export interface ContainerCommand {
  command: string;
  args: string[];
}

/** mkdtemp names (`iges-XXXXXX`) are unique and valid container names. */
export function containerNameFor(stagingDir: string): string {
  return path.basename(stagingDir);
}

/**
 * Only the handler's own fixed filenames are placed on the command line.
 */
export function buildContainerCommand(config: ContainerToolConfig, stagingDir: string): ContainerCommand {
  const mount = config.mountPoint;
  return {
    command: config.containerRuntime,
    args: [
      'run',
      '--rm',
      '--name', containerNameFor(stagingDir),
      '-v', `${stagingDir}:${mount}`,
      config.toolImage,
      config.toolCommand,
      path.posix.join(mount, INPUT_FILENAME),
      '-o', path.posix.join(mount, OUTPUT_FILENAME),
      '-3',
    ],
  };
}

function toolOutput(result: ProcessResult): string {
  return result.stderr || result.stdout;
}

export function interpretResult(result: ProcessResult): void {
  if (result.exitCode === 0) return;

  const output = toolOutput(result);
  if (result.exitCode !== null && RUNTIME_EXIT_CODES.has(result.exitCode)) {
    throw new EnvironmentError(
      output || `Container runtime failed with exit code ${result.exitCode}.`
    );
  }

  const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${result.exitCode}`;
  throw new ConversionError(output || `Mesh tool exited with ${status} and no output.`);
}

export class ContainerMeshTool implements MeshTool {
  constructor(
    private readonly config: ContainerToolConfig,
    private readonly runner: ProcessRunner = runProcess
  ) {}

  async run(stagingDir: string, logger: Logger): Promise<void> {
    const { command, args } = buildContainerCommand(this.config, stagingDir);
    logger.debug('Running mesh tool', { command, args });

    let result: ProcessResult;
    try {
      result = await this.runner(command, args, {
        timeoutMs: this.config.timeoutMs,
        killGraceMs: this.config.killGraceMs,
        onSpawn: (pid) => logger.info('Mesh tool started', { pid }),
      });
    } catch (err) {
      // the runtime CLI is gone, but the container may have ignored the proxied signal
      if (err instanceof TimeoutError) {
        await this.killContainer(containerNameFor(stagingDir), logger);
      }
      throw err;
    }

    logger.info('Mesh tool exited', {
      exitCode: result.exitCode,
      signal: result.signal,
      durationMs: result.durationMs,
    });
    interpretResult(result);
  }

  private async killContainer(name: string, logger: Logger): Promise<void> {
    try {
      const result = await this.runner(this.config.containerRuntime, ['kill', name], {
        timeoutMs: this.config.killGraceMs,
      });
      // non-zero when --rm already removed the container
      logger.debug('Container kill finished', { name, exitCode: result.exitCode, stderr: result.stderr });
    } catch (err) {
      logger.warn('Could not kill timed-out container', { name }, err);
    }
  }
}
