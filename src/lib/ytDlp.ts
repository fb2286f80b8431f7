import path from 'path';
import { promises as fs, constants as fsConstants } from 'fs';
import log from '../log';
import { describeError, EngineFailureError } from '../services/errors';
import type { EngineDownloadRequest, EngineDownloadResult, EngineMediaInfo, MediaEngine } from '../services/types';
import { runProcess, type ProcessRunner } from './process';

export async function findYtDlpBinary(configured?: string): Promise<string> {
    const candidates = [
        configured,
        process.env.YT_DLP_BINARY,
        process.env.YT_DLP_PATH,
        path.join(process.cwd(), 'bin', 'yt-dlp'),
        path.join(process.cwd(), 'bin', 'yt-dlp.exe'),
        'yt-dlp',
    ];

    for (const candidate of candidates) {
        if (!candidate) continue;

        // Bare names are resolved through PATH by spawn.
        if (!candidate.includes('/') && !candidate.includes('\\')) {
            return candidate;
        }

        try {
            await fs.access(candidate, fsConstants.X_OK);
            return candidate;
        } catch {
            continue;
        }
    }

    throw new Error('yt-dlp not found. Set YT_DLP_BINARY or place the executable at ./bin/yt-dlp.');
}

export interface YtDlpEngineOptions {
    binary: string;
    cookiesPath?: string;
    ffmpegPath?: string;
    userAgent: string;
    /** Target of `--audio-format` for audio downloads; `original` keeps the source stream. */
    audioFormat: string;
    videoMergeFormat: string;
}

export class YtDlpEngine implements MediaEngine {
    private readonly options: YtDlpEngineOptions;
    private readonly run: ProcessRunner;

    constructor(options: YtDlpEngineOptions, run: ProcessRunner = runProcess) {
        this.options = options;
        this.run = run;
    }

    public async fetchInfo(url: string, timeoutMs: number): Promise<EngineMediaInfo> {
        const args = [
            '--dump-single-json',
            '--no-warnings',
            '--no-playlist',
            '--skip-download',
            '--ignore-no-formats-error',
            ...(await this.commonArgs()),
            url,
        ];

        const { stdout } = await this.run(this.options.binary, args, { timeoutMs });
        const payload = parseJsonOutput(stdout);
        if (!payload) {
            throw new EngineFailureError('yt-dlp returned no metadata for this URL.', 0);
        }
        return toMediaInfo(payload);
    }

    public async download(request: EngineDownloadRequest): Promise<EngineDownloadResult> {
        const args = [
            '--no-warnings',
            '--no-playlist',
            '--format', request.selector,
            '--output', request.outputTemplate,
            '--dump-json',
            '--no-simulate',
            ...this.postProcessingArgs(request.kind),
            ...(await this.commonArgs()),
            request.url,
        ];

        log.debug(`yt-dlp download with selector "${request.selector}"`);
        const { stdout } = await this.run(this.options.binary, args, { timeoutMs: request.timeoutMs });
        const payload = parseJsonOutput(stdout);
        return { title: payload ? readString(payload.title) : undefined };
    }

    private postProcessingArgs(kind: EngineDownloadRequest['kind']): string[] {
        const args: string[] = [];
        if (kind === 'video') {
            args.push('--merge-output-format', this.options.videoMergeFormat);
        } else if (this.options.audioFormat !== 'original') {
            args.push('--extract-audio', '--audio-format', this.options.audioFormat);
        }
        if (this.options.ffmpegPath) {
            args.push('--ffmpeg-location', this.options.ffmpegPath);
        }
        return args;
    }

    private async commonArgs(): Promise<string[]> {
        const args = ['--user-agent', this.options.userAgent];
        if (this.options.cookiesPath && await fileExists(this.options.cookiesPath)) {
            args.push('--cookies', this.options.cookiesPath);
        }
        return args;
    }
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath, fsConstants.R_OK);
        return true;
    } catch {
        return false;
    }
}

/** Last JSON object printed on stdout, if any. */
function parseJsonOutput(stdout: string): Record<string, unknown> | undefined {
    const lines = stdout.split(/\r?\n/).map(line => line.trim()).filter(line => line.startsWith('{'));
    for (let index = lines.length - 1; index >= 0; index--) {
        try {
            const parsed: unknown = JSON.parse(lines[index]);
            if (isRecord(parsed)) {
                return parsed;
            }
        } catch (error) {
            log.debug(`Ignoring unparsable yt-dlp output line: ${describeError(error)}`);
        }
    }
    return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMediaInfo(payload: Record<string, unknown>): EngineMediaInfo {
    return {
        title: readString(payload.title),
        thumbnail: readString(payload.thumbnail),
        duration: readNumber(payload.duration),
        uploader: readString(payload.uploader) ?? readString(payload.channel),
        viewCount: readNumber(payload.view_count),
        formats: Array.isArray(payload.formats) ? payload.formats : [],
    };
}

function readString(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim() ? value : undefined;
}

function readNumber(value: unknown): number | undefined {
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
