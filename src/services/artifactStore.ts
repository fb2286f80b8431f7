import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import log from '../log';
import { describeError, UnsafePathError } from './errors';

export interface StoredEntry {
    name: string;
    modifiedAt: number;
}

/**
 * Directory the engine writes into. Kept behind an interface so the
 * orchestrator can run against an in-memory fake.
 */
export interface ArtifactStore {
    readonly directory: string;
    list(): Promise<StoredEntry[]>;
    remove(name: string): Promise<void>;
    has(name: string): Promise<boolean>;
    /** Absolute path of `name` inside the directory. Throws `UnsafePathError` on traversal. */
    resolve(name: string): string;
}

const JOB_SEPARATORS = ['.', '_', '-'];
const PARTIAL_SUFFIXES = ['.part', '.tmp', '.temp', '.ytdl'];
const PARTIAL_PATTERNS = [/\.part-frag\d+$/i, /\.temp\.[a-z0-9]+$/i];

export function createJobId(): string {
    return randomUUID().replace(/-/g, '');
}

export function belongsToJob(name: string, jobId: string): boolean {
    if (!name.startsWith(jobId)) return false;
    return JOB_SEPARATORS.includes(name.charAt(jobId.length));
}

export function isPartialArtifact(name: string): boolean {
    const lower = name.toLowerCase();
    return PARTIAL_SUFFIXES.some(suffix => lower.endsWith(suffix))
        || PARTIAL_PATTERNS.some(pattern => pattern.test(lower));
}

/** Most recently modified finished file written for `jobId`. */
export async function locateArtifact(store: ArtifactStore, jobId: string): Promise<StoredEntry | undefined> {
    const entries = await store.list();
    let newest: StoredEntry | undefined;
    for (const entry of entries) {
        if (!belongsToJob(entry.name, jobId) || isPartialArtifact(entry.name)) {
            continue;
        }
        if (!newest || entry.modifiedAt > newest.modifiedAt) {
            newest = entry;
        }
    }
    return newest;
}

/** Best-effort removal of everything written for `jobId`. Returns the removed names. */
export async function removeArtifacts(store: ArtifactStore, jobId: string): Promise<string[]> {
    let entries: StoredEntry[];
    try {
        entries = await store.list();
    } catch (error) {
        log.warn(`Could not list ${store.directory} for cleanup of ${jobId}: ${describeError(error)}`);
        return [];
    }

    const removed: string[] = [];
    for (const entry of entries) {
        if (!belongsToJob(entry.name, jobId)) continue;
        try {
            await store.remove(entry.name);
            removed.push(entry.name);
        } catch (error) {
            log.debug(`Ignoring failed removal of ${entry.name}: ${describeError(error)}`);
        }
    }
    return removed;
}

export function isSafeFileName(name: string): boolean {
    if (!name || name === '.' || name === '..') return false;
    if (name.includes('\0') || name.includes('/') || name.includes('\\')) return false;
    return path.basename(name) === name;
}

export class FsArtifactStore implements ArtifactStore {
    public readonly directory: string;

    constructor(directory: string) {
        this.directory = path.resolve(directory);
    }

    public async ensureDirectory(): Promise<void> {
        await fs.mkdir(this.directory, { recursive: true });
    }

    public async list(): Promise<StoredEntry[]> {
        const dirents = await fs.readdir(this.directory, { withFileTypes: true });
        const entries: StoredEntry[] = [];
        for (const dirent of dirents) {
            if (!dirent.isFile()) continue;
            try {
                const stat = await fs.stat(path.join(this.directory, dirent.name));
                entries.push({ name: dirent.name, modifiedAt: stat.mtimeMs });
            } catch (error) {
                // removed between readdir and stat
                log.debug(`Skipping ${dirent.name}: ${describeError(error)}`);
            }
        }
        return entries;
    }

    public async remove(name: string): Promise<void> {
        await fs.rm(this.resolve(name), { force: true });
    }

    public async has(name: string): Promise<boolean> {
        try {
            const stat = await fs.stat(this.resolve(name));
            return stat.isFile();
        } catch (error) {
            if (error instanceof UnsafePathError) throw error;
            return false;
        }
    }

    public resolve(name: string): string {
        if (!isSafeFileName(name)) {
            throw new UnsafePathError();
        }
        const resolved = path.resolve(this.directory, name);
        if (path.dirname(resolved) !== this.directory) {
            throw new UnsafePathError();
        }
        return resolved;
    }
}
