import log from '../log';
import type { AppConfig } from '../config';
import { createJobId, isPartialArtifact, type ArtifactStore } from './artifactStore';
import { DownloadOrchestrator } from './downloadOrchestrator';
import {
    ArtifactNotFoundError,
    EngineFailureError,
    ExtractionError,
    InvalidRequestError,
    MediaServiceError,
    describeError,
} from './errors';
import { buildQualityLadder } from './qualityLadder';
import { planSelectors } from './selectorPlanner';
import type { DownloadRequest, DownloadResult, MediaEngine, MediaSummary } from './types';
import { isValidHttpUrl, sanitizeFileComponent } from './utils';

export const FILES_ROUTE = '/files';

export type MediaServiceConfig = Pick<AppConfig, 'fetchTimeoutMs' | 'downloadTimeoutMs' | 'ladder' | 'planner'>;

export class MediaService {
    private readonly engine: MediaEngine;
    private readonly store: ArtifactStore;
    private readonly config: MediaServiceConfig;
    private readonly orchestrator: DownloadOrchestrator;

    constructor(engine: MediaEngine, store: ArtifactStore, config: MediaServiceConfig) {
        this.engine = engine;
        this.store = store;
        this.config = config;
        this.orchestrator = new DownloadOrchestrator(engine, store, { timeoutMs: config.downloadTimeoutMs });
    }

    public async fetchMedia(url: string): Promise<MediaSummary> {
        const target = assertUsableUrl(url);

        try {
            const info = await this.engine.fetchInfo(target, this.config.fetchTimeoutMs);
            const qualities = buildQualityLadder(info.formats, this.config.ladder);
            log.info(`Resolved ${info.formats.length} formats into ${qualities.length} options for ${target}`);

            return {
                title: info.title ?? 'Unknown',
                thumbnail: info.thumbnail ?? '',
                duration: info.duration ?? null,
                uploader: info.uploader ?? null,
                view_count: info.viewCount ?? null,
                qualities,
            };
        } catch (error) {
            if (error instanceof MediaServiceError) {
                throw error;
            }
            if (error instanceof EngineFailureError) {
                throw new ExtractionError(error.message, error.stderr || undefined);
            }
            throw new MediaServiceError('Media engine is unavailable.', 500, describeError(error));
        }
    }

    public async download(request: DownloadRequest): Promise<DownloadResult> {
        const target = assertUsableUrl(request.url);
        if (!request.selector.trim()) {
            throw new InvalidRequestError('A format selector is required.');
        }

        const plan = planSelectors(request.selector, request.kind, this.config.planner);
        const jobId = createJobId();
        log.info(`[${jobId}] ${request.kind} download of ${target}; plan: ${plan.join(' | ')}`);

        const artifact = await this.orchestrator.execute(target, plan, request.kind, jobId);

        const title = sanitizeFileComponent(artifact.title, request.kind);
        const quality = sanitizeFileComponent(request.qualityLabel, request.kind);
        const extension = artifact.ext ? `.${artifact.ext}` : '';

        return {
            download_url: `${FILES_ROUTE}/${encodeURIComponent(artifact.name)}`,
            filename: `${title}_${quality}${extension}`,
        };
    }

    /** Absolute path of a previously produced artifact. Unfinished downloads are not served. */
    public async resolveArtifactPath(name: string): Promise<string> {
        const filePath = this.store.resolve(name);
        if (isPartialArtifact(name) || !(await this.store.has(name))) {
            throw new ArtifactNotFoundError();
        }
        return filePath;
    }
}

function assertUsableUrl(url: string): string {
    const trimmed = url.trim();
    if (!trimmed) {
        throw new InvalidRequestError('URL is required.');
    }
    if (!isValidHttpUrl(trimmed)) {
        throw new InvalidRequestError('URL must be a valid http(s) address.');
    }
    return trimmed;
}
