import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { DEFAULT_PLANNER_POLICY } from '../../config';
import { FsArtifactStore, type ArtifactStore, type StoredEntry } from '../artifactStore';
import { DownloadOrchestrator } from '../downloadOrchestrator';
import { DownloadFailedError, EngineFailureError, EngineTimeoutError } from '../errors';
import { planSelectors } from '../selectorPlanner';
import type { EngineDownloadRequest, EngineDownloadResult, MediaEngine } from '../types';

type DownloadStep = (request: EngineDownloadRequest, attempt: number) => Promise<EngineDownloadResult>;

class ScriptedEngine implements MediaEngine {
    public readonly requests: EngineDownloadRequest[] = [];

    constructor(private readonly step: DownloadStep) {}

    public async fetchInfo(): Promise<never> {
        throw new Error('not used');
    }

    public async download(request: EngineDownloadRequest): Promise<EngineDownloadResult> {
        this.requests.push(request);
        return this.step(request, this.requests.length);
    }
}

const MEDIA_URL = 'https://media.example.com/watch?v=abc';

let tmpDir: string;
let store: FsArtifactStore;

async function writeOutput(request: EngineDownloadRequest, ext: string) {
    await fs.writeFile(request.outputTemplate.replace('%(ext)s', ext), 'data');
}

beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'orchestrator-'));
    store = new FsArtifactStore(tmpDir);
});

afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('DownloadOrchestrator', () => {
    it('falls back after engine failures and cleans up between attempts', async () => {
        const directoryBeforeAttempt: string[][] = [];
        const engine = new ScriptedEngine(async (request, attempt) => {
            directoryBeforeAttempt.push((await fs.readdir(tmpDir)).sort());
            if (attempt === 1) {
                await writeOutput(request, 'mp4.part');
                throw new EngineFailureError('ERROR: Requested format is not available', 1);
            }
            if (attempt === 2) {
                await writeOutput(request, 'f137.mp4');
                throw new EngineFailureError('ERROR: unable to download video data', 1);
            }
            await writeOutput(request, 'mp4');
            return { title: 'Sample Clip' };
        });
        const orchestrator = new DownloadOrchestrator(engine, store, { timeoutMs: 1000 });
        const plan = planSelectors('137', 'video', DEFAULT_PLANNER_POLICY);

        const artifact = await orchestrator.execute(MEDIA_URL, plan, 'video', 'job123');

        expect(engine.requests.map(request => request.selector)).toEqual(plan.slice(0, 3));
        expect(directoryBeforeAttempt).toEqual([[], [], []]);
        expect(artifact).toEqual({
            jobId: 'job123',
            name: 'job123.mp4',
            path: path.join(path.resolve(tmpDir), 'job123.mp4'),
            ext: 'mp4',
            selector: plan[2],
            title: 'Sample Clip',
        });
        expect(await fs.readdir(tmpDir)).toEqual(['job123.mp4']);
    });

    it('passes the output template, kind and timeout to the engine', async () => {
        jest.spyOn(Date, 'now').mockReturnValue(50_000);
        const engine = new ScriptedEngine(async (request) => {
            await writeOutput(request, 'm4a');
            return {};
        });
        const orchestrator = new DownloadOrchestrator(engine, store, { timeoutMs: 4321 });

        const artifact = await orchestrator.execute(MEDIA_URL, ['140'], 'audio', 'jobA');

        expect(engine.requests).toEqual([{
            url: MEDIA_URL,
            selector: '140',
            kind: 'audio',
            outputTemplate: path.join(path.resolve(tmpDir), 'jobA.%(ext)s'),
            timeoutMs: 4321,
        }]);
        expect(artifact.ext).toBe('m4a');
        expect(artifact.title).toBeUndefined();
    });

    it('treats a success without output as a soft failure', async () => {
        const engine = new ScriptedEngine(async (request, attempt) => {
            if (attempt === 2) {
                await writeOutput(request, 'webm');
            }
            return {};
        });
        const orchestrator = new DownloadOrchestrator(engine, store, { timeoutMs: 1000 });

        const artifact = await orchestrator.execute(MEDIA_URL, ['first', 'second', 'best'], 'video', 'jobB');

        expect(engine.requests).toHaveLength(2);
        expect(artifact.name).toBe('jobB.webm');
        expect(artifact.selector).toBe('second');
    });

    it('reports the last engine error once the plan is exhausted', async () => {
        const engine = new ScriptedEngine(async (request, attempt) => {
            throw new EngineFailureError(`ERROR: attempt ${attempt} failed for ${request.selector}`, 1);
        });
        const orchestrator = new DownloadOrchestrator(engine, store, { timeoutMs: 1000 });

        const failure = orchestrator.execute(MEDIA_URL, ['a', 'b', 'best'], 'video', 'jobC');

        await expect(failure).rejects.toBeInstanceOf(DownloadFailedError);
        await expect(failure).rejects.toMatchObject({
            message: 'ERROR: attempt 3 failed for best',
            statusCode: 500,
            attempts: 3,
        });
    });

    it('reports a missing artifact when every attempt produced nothing', async () => {
        const engine = new ScriptedEngine(async () => ({}));
        const orchestrator = new DownloadOrchestrator(engine, store, { timeoutMs: 1000 });

        await expect(orchestrator.execute(MEDIA_URL, ['best'], 'video', 'jobD')).rejects.toMatchObject({
            message: 'Engine reported success but no output file was found.',
        });
    });

    it('fails with a generic message on an empty plan', async () => {
        const engine = new ScriptedEngine(async () => ({}));
        const orchestrator = new DownloadOrchestrator(engine, store, { timeoutMs: 1000 });

        await expect(orchestrator.execute(MEDIA_URL, [], 'video', 'jobE')).rejects.toMatchObject({
            message: 'Download failed.',
            attempts: 0,
        });
        expect(engine.requests).toHaveLength(0);
    });

    it('stops on timeout and leaves no artifact behind', async () => {
        const engine = new ScriptedEngine(async (request) => {
            await writeOutput(request, 'mp4.part');
            await writeOutput(request, 'f137.mp4');
            throw new EngineTimeoutError(1000);
        });
        const orchestrator = new DownloadOrchestrator(engine, store, { timeoutMs: 1000 });

        await expect(orchestrator.execute(MEDIA_URL, ['137', 'best'], 'video', 'jobF')).rejects.toBeInstanceOf(EngineTimeoutError);
        expect(engine.requests).toHaveLength(1);
        expect(await fs.readdir(tmpDir)).toEqual([]);
    });

    it('shares one time budget across attempts', async () => {
        let now = 1_000;
        jest.spyOn(Date, 'now').mockImplementation(() => now);
        const engine = new ScriptedEngine(async (request) => {
            await writeOutput(request, 'mp4.part');
            now += 600;
            throw new EngineFailureError('ERROR: unable to download video data', 1);
        });
        const orchestrator = new DownloadOrchestrator(engine, store, { timeoutMs: 1000 });

        const failure = orchestrator.execute(MEDIA_URL, ['137', 'bestvideo+bestaudio/best', 'best'], 'video', 'jobH');

        await expect(failure).rejects.toBeInstanceOf(EngineTimeoutError);
        await expect(failure).rejects.toMatchObject({ statusCode: 504, timeoutMs: 1000 });
        expect(engine.requests.map(request => request.timeoutMs)).toEqual([1000, 400]);
        expect(await fs.readdir(tmpDir)).toEqual([]);
    });

    it('keeps going when leftovers cannot be removed', async () => {
        const entries = new Map<string, number>([['jobG.mp4.part', 1]]);
        const stubbornStore: ArtifactStore = {
            directory: '/virtual',
            list: async (): Promise<StoredEntry[]> => [...entries].map(([name, modifiedAt]) => ({ name, modifiedAt })),
            remove: async () => {
                throw new Error('EBUSY');
            },
            has: async (name) => entries.has(name),
            resolve: (name) => path.join('/virtual', name),
        };
        const engine = new ScriptedEngine(async () => {
            entries.set('jobG.mkv', 2);
            return {};
        });
        const orchestrator = new DownloadOrchestrator(engine, stubbornStore, { timeoutMs: 1000 });

        const artifact = await orchestrator.execute(MEDIA_URL, ['best'], 'video', 'jobG');

        expect(artifact.name).toBe('jobG.mkv');
        expect(artifact.path).toBe(path.join('/virtual', 'jobG.mkv'));
    });
});
