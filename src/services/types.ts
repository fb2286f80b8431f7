export type MediaKind = 'video' | 'audio';

/**
 * One yt-dlp format record after normalization. Absent fields stay `undefined`;
 * the sentinel codec `"none"` is mapped to `undefined` as well.
 */
export interface CandidateFormat {
    formatId: string;
    height?: number;
    formatNote?: string;
    resolution?: string;
    ext?: string;
    protocol?: string;
    videoCodec?: string;
    audioCodec?: string;
    /** Total bitrate in kbit/s (`tbr`, falling back to `vbr`). */
    bitrate?: number;
    frameRate?: number;
    audioBitrate?: number;
}

export interface QualityOption {
    label: string;
    selector: string;
    kind: MediaKind;
    height: number;
}

export interface ScoringWeights {
    preferredContainer: string;
    containerWeight: number;
    directProtocolWeight: number;
    pairedAudioWeight: number;
    manifestPenalty: number;
    bitrateDivisor: number;
    frameRateDivisor: number;
    audioContainerBonus: number;
}

export interface LadderPolicy {
    minHeight: number;
    preferredAudioContainer: string;
    scoring: ScoringWeights;
}

export interface PlannerPolicy {
    videoContainer: string;
    audioContainer: string;
}

export interface MediaSummary {
    title: string;
    thumbnail: string;
    duration: number | null;
    uploader: string | null;
    view_count: number | null;
    qualities: QualityOption[];
}

export interface DownloadRequest {
    url: string;
    selector: string;
    kind: MediaKind;
    qualityLabel: string;
}

export interface DownloadResult {
    download_url: string;
    filename: string;
}

export interface StoredArtifact {
    jobId: string;
    name: string;
    path: string;
    /** Extension without the leading dot, as written by the engine. */
    ext: string;
    selector: string;
    title?: string;
}

/** Metadata returned by the engine in metadata-only mode. */
export interface EngineMediaInfo {
    title?: string;
    thumbnail?: string;
    duration?: number;
    uploader?: string;
    viewCount?: number;
    formats: unknown[];
}

export interface EngineDownloadRequest {
    url: string;
    selector: string;
    kind: MediaKind;
    /** Output path template; the engine picks the extension. */
    outputTemplate: string;
    timeoutMs: number;
}

export interface EngineDownloadResult {
    title?: string;
}

export interface MediaEngine {
    fetchInfo(url: string, timeoutMs: number): Promise<EngineMediaInfo>;
    download(request: EngineDownloadRequest): Promise<EngineDownloadResult>;
}
