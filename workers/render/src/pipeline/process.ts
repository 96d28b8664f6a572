import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface ProcessResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

export interface RunProcessOptions {
    /** 0 or undefined disables the timeout. */
    timeoutMs?: number;
    spawnFn?: SpawnFn;
    env?: NodeJS.ProcessEnv;
}

// Only what ffmpeg needs to find itself, its libraries and fonts; secrets stay in this process.
const PASSTHROUGH_ENV = ['PATH', 'HOME', 'LANG', 'LC_ALL', 'TMPDIR', 'FONTCONFIG_PATH', 'FONTCONFIG_FILE', 'LD_LIBRARY_PATH', 'DYLD_LIBRARY_PATH'];

export function minimalEnv(source: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = {};
    for (const key of PASSTHROUGH_ENV) {
        const value = source[key];
        if (value !== undefined) env[key] = value;
    }
    if (env.PATH === undefined) env.PATH = '/usr/bin:/bin:/usr/sbin:/sbin';
    return env;
}

/**
 * Runs a command to completion and collects its output.
 * Resolves on any exit (callers decide what a non-zero code means); rejects only when the
 * process cannot be started.
 */
export function runProcess(command: string, args: readonly string[], options: RunProcessOptions = {}): Promise<ProcessResult> {
    const spawnFn = options.spawnFn ?? spawn;

    return new Promise<ProcessResult>((resolve, reject) => {
        const child = spawnFn(command, args, {
            env: options.env ?? minimalEnv(),
            stdio: ['ignore', 'pipe', 'pipe']
        });

        let stdout = '';
        let stderr = '';
        let timedOut = false;
        let settled = false;

        child.stdout?.on('data', (data: Buffer) => {
            stdout += data.toString();
        });
        child.stderr?.on('data', (data: Buffer) => {
            stderr += data.toString();
        });

        const timer = options.timeoutMs && options.timeoutMs > 0
            ? setTimeout(() => {
                timedOut = true;
                child.kill('SIGKILL');
            }, options.timeoutMs)
            : undefined;

        child.on('error', (err) => {
            if (timer) clearTimeout(timer);
            if (settled) return;
            settled = true;
            reject(err);
        });

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
            if (timer) clearTimeout(timer);
            if (settled) return;
            settled = true;
            resolve({ exitCode: code, signal, stdout, stderr, timedOut });
        });
    });
}
