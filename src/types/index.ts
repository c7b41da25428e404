import type { Logger } from '../utils/logger';

export interface UploadedFile {
    originalname: string;
    buffer: Buffer;
}

export interface ConversionOutput {
    filename: string; // <original stem>.obj
    data: Buffer;
}

export interface ProcessResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    durationMs: number;
}

export interface RunProcessOptions {
    timeoutMs: number;
    killGraceMs?: number;
    cwd?: string;
    onSpawn?: (pid: number) => void;
}

export type ProcessRunner = (
    command: string,
    args: string[],
    options: RunProcessOptions
) => Promise<ProcessResult>;

/**
 * Converts `input.igs` inside a staging directory into `output.obj` beside it.
 */
export interface MeshTool {
    run(stagingDir: string, logger: Logger): Promise<void>;
}
