import { spawn } from 'child_process';
import { EngineFailureError, EngineTimeoutError } from '../services/errors';

export interface ProcessResult {
    stdout: string;
    stderr: string;
}

export interface RunOptions {
    timeoutMs: number;
}

export type ProcessRunner = (command: string, args: string[], options: RunOptions) => Promise<ProcessResult>;

const STDERR_TAIL_LENGTH = 4000;

/**
 * Last meaningful line of a diagnostic stream, preferring `ERROR:` lines.
 */
export function lastDiagnosticLine(output: string): string | undefined {
    const lines = output
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(Boolean);
    const errorLines = lines.filter(line => line.startsWith('ERROR:'));
    return errorLines.pop() ?? lines.pop();
}

/**
 * Runs a command to completion. Past `timeoutMs` the child's whole process
 * group gets SIGKILL and the promise rejects with `EngineTimeoutError`; a
 * non-zero exit rejects with `EngineFailureError` carrying the last stderr line.
 */
export function runProcess(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    return new Promise<ProcessResult>((resolve, reject) => {
        // Own process group, so helpers the engine starts (ffmpeg) die with it.
        const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], detached: process.platform !== 'win32' });

        let stdoutBuffer = '';
        let stderrBuffer = '';
        let timedOut = false;
        let settled = false;

        const killTree = () => {
            if (child.pid !== undefined && process.platform !== 'win32') {
                try {
                    process.kill(-child.pid, 'SIGKILL');
                    return;
                } catch {
                    // group already gone; fall through to the direct child
                }
            }
            child.kill('SIGKILL');
        };

        const timer = setTimeout(() => {
            timedOut = true;
            killTree();
        }, options.timeoutMs);

        child.stdout.on('data', (data) => {
            stdoutBuffer += data.toString();
        });

        child.stderr.on('data', (data) => {
            stderrBuffer += data.toString();
        });

        child.on('error', (err) => {
            clearTimeout(timer);
            if (settled) return;
            settled = true;
            reject(err);
        });

        // After a kill, 'close' may wait on pipes still held by orphans.
        child.on('exit', () => {
            if (!timedOut || settled) return;
            settled = true;
            child.stdout.destroy();
            child.stderr.destroy();
            reject(new EngineTimeoutError(options.timeoutMs));
        });

        child.on('close', (code) => {
            clearTimeout(timer);
            if (settled) return;
            settled = true;

            if (timedOut) {
                reject(new EngineTimeoutError(options.timeoutMs));
                return;
            }
            if (code === 0) {
                resolve({ stdout: stdoutBuffer, stderr: stderrBuffer });
                return;
            }
            const message = lastDiagnosticLine(stderrBuffer) ?? `${command} exited with code ${code}`;
            reject(new EngineFailureError(message, code, stderrBuffer.slice(-STDERR_TAIL_LENGTH)));
        });
    });
}
