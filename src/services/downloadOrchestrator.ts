import path from 'path';
import log from '../log';
import { createJobId, locateArtifact, removeArtifacts, type ArtifactStore } from './artifactStore';
import { describeError, DownloadFailedError, EngineTimeoutError } from './errors';
import type { MediaEngine, MediaKind, StoredArtifact } from './types';

export interface OrchestratorOptions {
    /** Budget for the whole plan; each attempt gets what is left of it. */
    timeoutMs: number;
}

const GENERIC_FAILURE = 'Download failed.';
const MISSING_ARTIFACT = 'Engine reported success but no output file was found.';

/**
 * Runs a selector plan against the engine, one attempt at a time, until one
 * leaves a finished file on disk.
 */
export class DownloadOrchestrator {
    private readonly engine: MediaEngine;
    private readonly store: ArtifactStore;
    private readonly options: OrchestratorOptions;

    constructor(engine: MediaEngine, store: ArtifactStore, options: OrchestratorOptions) {
        this.engine = engine;
        this.store = store;
        this.options = options;
    }

    public async execute(url: string, plan: readonly string[], kind: MediaKind, jobId = createJobId()): Promise<StoredArtifact> {
        const outputTemplate = path.join(this.store.directory, `${jobId}.%(ext)s`);
        const deadline = Date.now() + this.options.timeoutMs;
        let lastError: string | undefined;
        let attempt = 0;

        for (const selector of plan) {
            const remainingMs = deadline - Date.now();
            if (remainingMs <= 0) {
                log.error(`[${jobId}] time budget of ${this.options.timeoutMs}ms spent after ${attempt} attempts; aborting`);
                await removeArtifacts(this.store, jobId);
                throw new EngineTimeoutError(this.options.timeoutMs);
            }

            attempt++;
            const leftovers = await removeArtifacts(this.store, jobId);
            if (leftovers.length > 0) {
                log.debug(`[${jobId}] removed leftovers before attempt ${attempt}: ${leftovers.join(', ')}`);
            }

            log.info(`[${jobId}] attempt ${attempt}/${plan.length} with selector "${selector}"`);

            try {
                const result = await this.engine.download({
                    url,
                    selector,
                    kind,
                    outputTemplate,
                    timeoutMs: remainingMs,
                });

                const entry = await locateArtifact(this.store, jobId);
                if (entry) {
                    log.info(`[${jobId}] downloaded ${entry.name} with selector "${selector}"`);
                    return {
                        jobId,
                        name: entry.name,
                        path: this.store.resolve(entry.name),
                        ext: path.extname(entry.name).replace(/^\./, ''),
                        selector,
                        title: result.title,
                    };
                }

                lastError = MISSING_ARTIFACT;
                log.warn(`[${jobId}] selector "${selector}": ${MISSING_ARTIFACT}`);
            } catch (error) {
                if (error instanceof EngineTimeoutError) {
                    log.error(`[${jobId}] selector "${selector}" timed out after ${error.timeoutMs}ms; aborting`);
                    await removeArtifacts(this.store, jobId);
                    throw error;
                }
                lastError = describeError(error);
                log.warn(`[${jobId}] selector "${selector}" failed: ${lastError}`);
            }
        }

        await removeArtifacts(this.store, jobId);
        throw new DownloadFailedError(lastError ?? GENERIC_FAILURE, attempt);
    }
}
