import path from 'path';
import type { LadderPolicy, PlannerPolicy } from './services/types';

export interface AppConfig {
    port: number;
    downloadDir: string;
    ytDlpBinary?: string;
    cookiesPath: string;
    ffmpegPath?: string;
    corsOrigins: string[];
    userAgent: string;
    fetchTimeoutMs: number;
    downloadTimeoutMs: number;
    audioFormat: string;
    videoMergeFormat: string;
    ladder: LadderPolicy;
    planner: PlannerPolicy;
}

const DEFAULT_PORT = 10000;
const DEFAULT_FETCH_TIMEOUT_MS = 45_000;
const DEFAULT_DOWNLOAD_TIMEOUT_MS = 10 * 60_000;
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_LADDER_POLICY: LadderPolicy = {
    minHeight: 144,
    preferredAudioContainer: 'm4a',
    scoring: {
        preferredContainer: 'mp4',
        containerWeight: 100,
        directProtocolWeight: 50,
        pairedAudioWeight: 25,
        manifestPenalty: 10,
        bitrateDivisor: 1000,
        frameRateDivisor: 100,
        audioContainerBonus: 32,
    },
};

export const DEFAULT_PLANNER_POLICY: PlannerPolicy = {
    videoContainer: 'mp4',
    audioContainer: 'm4a',
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const cwd = process.cwd();
    const minHeight = parseInteger(env.MIN_VIDEO_HEIGHT, DEFAULT_LADDER_POLICY.minHeight, 1);

    return {
        port: parseInteger(env.PORT, DEFAULT_PORT, 1),
        downloadDir: path.resolve(cwd, nonEmpty(env.DOWNLOAD_DIR) ?? 'downloads'),
        ytDlpBinary: nonEmpty(env.YT_DLP_BINARY) ?? nonEmpty(env.YT_DLP_PATH),
        cookiesPath: path.resolve(cwd, nonEmpty(env.YT_DLP_COOKIES_PATH) ?? 'cookies.txt'),
        ffmpegPath: nonEmpty(env.FFMPEG_PATH),
        corsOrigins: parseList(env.CORS_ORIGINS, ['*']),
        userAgent: nonEmpty(env.USER_AGENT) ?? DEFAULT_USER_AGENT,
        fetchTimeoutMs: parseInteger(env.FETCH_TIMEOUT_MS, DEFAULT_FETCH_TIMEOUT_MS, 1),
        downloadTimeoutMs: parseInteger(env.DOWNLOAD_TIMEOUT_MS, DEFAULT_DOWNLOAD_TIMEOUT_MS, 1),
        audioFormat: nonEmpty(env.AUDIO_FORMAT) ?? 'mp3',
        videoMergeFormat: nonEmpty(env.VIDEO_MERGE_FORMAT) ?? 'mp4',
        ladder: {
            ...DEFAULT_LADDER_POLICY,
            minHeight,
            scoring: { ...DEFAULT_LADDER_POLICY.scoring },
        },
        planner: { ...DEFAULT_PLANNER_POLICY },
    };
}

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function parseInteger(value: string | undefined, fallback: number, min: number): number {
    if (!value) return fallback;
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function parseList(value: string | undefined, defaults: string[]): string[] {
    const entries = (value ?? '')
        .split(',')
        .map(item => item.trim())
        .filter(Boolean);
    return entries.length > 0 ? entries : defaults;
}
