import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { findYtDlpBinary, YtDlpEngine, type YtDlpEngineOptions } from '../ytDlp';
import type { ProcessResult, RunOptions } from '../process';
import { EngineFailureError } from '../../services/errors';

const ORIGINAL_ENV = { ...process.env };
const MEDIA_URL = 'https://media.example.com/watch?v=abc';

let tmpDir: string;

beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'yt-dlp-'));
    delete process.env.YT_DLP_BINARY;
    delete process.env.YT_DLP_PATH;
});

afterEach(async () => {
    process.env = { ...ORIGINAL_ENV };
    await fs.rm(tmpDir, { recursive: true, force: true });
});

function createRunner(stdout: string) {
    return jest.fn(async (_command: string, _args: string[], _options: RunOptions): Promise<ProcessResult> => ({
        stdout,
        stderr: '',
    }));
}

function engineOptions(overrides: Partial<YtDlpEngineOptions> = {}): YtDlpEngineOptions {
    return {
        binary: 'yt-dlp',
        cookiesPath: path.join(tmpDir, 'cookies.txt'),
        userAgent: 'test-agent',
        audioFormat: 'mp3',
        videoMergeFormat: 'mp4',
        ...overrides,
    };
}

function valueAfter(args: string[], flag: string): string | undefined {
    const index = args.indexOf(flag);
    return index === -1 ? undefined : args[index + 1];
}

describe('findYtDlpBinary', () => {
    it('prefers the configured relative name', async () => {
        await expect(findYtDlpBinary('custom-binary')).resolves.toBe('custom-binary');
    });

    it('resolves an absolute path from the environment when it is executable', async () => {
        const fakeBinaryPath = path.join(tmpDir, 'yt-dlp');
        await fs.writeFile(fakeBinaryPath, '#!/bin/sh\nexit 0\n', { encoding: 'utf-8' });
        await fs.chmod(fakeBinaryPath, 0o755);
        process.env.YT_DLP_BINARY = fakeBinaryPath;

        await expect(findYtDlpBinary()).resolves.toBe(fakeBinaryPath);
    });

    it('skips absolute paths that do not exist', async () => {
        await expect(findYtDlpBinary(path.join(tmpDir, 'missing', 'yt-dlp'))).resolves.toBe('yt-dlp');
    });
});

describe('YtDlpEngine.fetchInfo', () => {
    it('parses the metadata dump', async () => {
        const run = createRunner(JSON.stringify({
            title: 'Clip',
            thumbnail: 'https://img.example.com/t.jpg',
            duration: 12.5,
            uploader: 'Someone',
            view_count: 42,
            formats: [{ format_id: '18' }],
        }));
        const engine = new YtDlpEngine(engineOptions(), run);

        const info = await engine.fetchInfo(MEDIA_URL, 3000);

        expect(info).toEqual({
            title: 'Clip',
            thumbnail: 'https://img.example.com/t.jpg',
            duration: 12.5,
            uploader: 'Someone',
            viewCount: 42,
            formats: [{ format_id: '18' }],
        });
        const [command, args, options] = run.mock.calls[0];
        expect(command).toBe('yt-dlp');
        expect(args).toContain('--dump-single-json');
        expect(args).toContain('--skip-download');
        expect(args).not.toContain('--cookies');
        expect(valueAfter(args, '--user-agent')).toBe('test-agent');
        expect(args[args.length - 1]).toBe(MEDIA_URL);
        expect(options).toEqual({ timeoutMs: 3000 });
    });

    it('passes the cookie file when it exists', async () => {
        const cookiesPath = path.join(tmpDir, 'cookies.txt');
        await fs.writeFile(cookiesPath, '# Netscape HTTP Cookie File\n');
        const run = createRunner('{"formats":[]}');
        const engine = new YtDlpEngine(engineOptions({ cookiesPath }), run);

        await engine.fetchInfo(MEDIA_URL, 3000);

        expect(valueAfter(run.mock.calls[0][1], '--cookies')).toBe(cookiesPath);
    });

    it('falls back to the channel name and an empty format list', async () => {
        const engine = new YtDlpEngine(engineOptions(), createRunner('{"channel":"Channel","formats":null}'));

        const info = await engine.fetchInfo(MEDIA_URL, 3000);

        expect(info.uploader).toBe('Channel');
        expect(info.formats).toEqual([]);
    });

    it('fails when no metadata is printed', async () => {
        const engine = new YtDlpEngine(engineOptions(), createRunner(''));

        await expect(engine.fetchInfo(MEDIA_URL, 3000)).rejects.toBeInstanceOf(EngineFailureError);
    });
});

describe('YtDlpEngine.download', () => {
    it('builds a merge download and reads the title', async () => {
        const run = createRunner('[download] 100%\n{"title":"Clip","ext":"mp4"}\n');
        const engine = new YtDlpEngine(engineOptions({ ffmpegPath: '/opt/ffmpeg' }), run);

        const result = await engine.download({
            url: MEDIA_URL,
            selector: '137+bestaudio/best',
            kind: 'video',
            outputTemplate: '/srv/downloads/job.%(ext)s',
            timeoutMs: 60_000,
        });

        expect(result).toEqual({ title: 'Clip' });
        const [, args, options] = run.mock.calls[0];
        expect(valueAfter(args, '--format')).toBe('137+bestaudio/best');
        expect(valueAfter(args, '--output')).toBe('/srv/downloads/job.%(ext)s');
        expect(valueAfter(args, '--merge-output-format')).toBe('mp4');
        expect(valueAfter(args, '--ffmpeg-location')).toBe('/opt/ffmpeg');
        expect(args).not.toContain('--extract-audio');
        expect(options).toEqual({ timeoutMs: 60_000 });
    });

    it('extracts audio in the configured format', async () => {
        const run = createRunner('');
        const engine = new YtDlpEngine(engineOptions(), run);

        const result = await engine.download({
            url: MEDIA_URL,
            selector: '140',
            kind: 'audio',
            outputTemplate: '/srv/downloads/job.%(ext)s',
            timeoutMs: 60_000,
        });

        expect(result).toEqual({ title: undefined });
        const args = run.mock.calls[0][1];
        expect(args).toContain('--extract-audio');
        expect(valueAfter(args, '--audio-format')).toBe('mp3');
        expect(args).not.toContain('--merge-output-format');
    });

    it('keeps the source audio stream when conversion is disabled', async () => {
        const run = createRunner('');
        const engine = new YtDlpEngine(engineOptions({ audioFormat: 'original' }), run);

        await engine.download({
            url: MEDIA_URL,
            selector: '140',
            kind: 'audio',
            outputTemplate: '/srv/downloads/job.%(ext)s',
            timeoutMs: 60_000,
        });

        expect(run.mock.calls[0][1]).not.toContain('--extract-audio');
    });
});
