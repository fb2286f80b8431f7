import type { CandidateFormat } from './types';

const NOTE_HEIGHT_PATTERN = /(?<!\d)(\d{3,4})p/i;
const RESOLUTION_PATTERN = /(\d+)\s*x\s*(\d+)/i;

/**
 * Turns one raw format record from the engine into a `CandidateFormat`.
 * Returns `null` when the record has no usable `format_id`.
 */
export function toCandidateFormat(raw: unknown): CandidateFormat | null {
    if (!isRecord(raw)) {
        return null;
    }

    const formatId = readString(raw.format_id);
    if (!formatId) {
        return null;
    }

    return {
        formatId,
        height: readNumber(raw.height),
        formatNote: readString(raw.format_note),
        resolution: readString(raw.resolution),
        ext: readString(raw.ext)?.toLowerCase(),
        protocol: readString(raw.protocol)?.toLowerCase(),
        videoCodec: readCodec(raw.vcodec),
        audioCodec: readCodec(raw.acodec),
        bitrate: readNumber(raw.tbr) ?? readNumber(raw.vbr),
        frameRate: readNumber(raw.fps),
        audioBitrate: readNumber(raw.abr),
    };
}

export function normalizeHeight(format: CandidateFormat): number | undefined {
    if (format.height !== undefined && format.height > 0) {
        return Math.round(format.height);
    }

    const noteMatch = format.formatNote?.match(NOTE_HEIGHT_PATTERN);
    if (noteMatch) {
        return Number.parseInt(noteMatch[1], 10);
    }

    const resolutionMatch = format.resolution?.match(RESOLUTION_PATTERN);
    if (resolutionMatch) {
        const height = Number.parseInt(resolutionMatch[2], 10);
        return height > 0 ? height : undefined;
    }

    return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | undefined {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }
    if (typeof value !== 'string') {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed || undefined;
}

function readNumber(value: unknown): number | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'string' && value.trim()) {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

function readCodec(value: unknown): string | undefined {
    const codec = readString(value);
    if (!codec || codec.toLowerCase() === 'none') {
        return undefined;
    }
    return codec;
}
