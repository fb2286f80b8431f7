import type { CandidateFormat, ScoringWeights } from './types';

const MANIFEST_PROTOCOLS = new Set(['m3u8', 'm3u8_native', 'http_dash_segments', 'dash', 'f4m', 'ism']);

export function isManifestProtocol(protocol?: string): boolean {
    if (!protocol) return false;
    return protocol.split('+').some(part => MANIFEST_PROTOCOLS.has(part));
}

export function isDirectProtocol(protocol?: string): boolean {
    if (!protocol || isManifestProtocol(protocol)) return false;
    return protocol === 'http' || protocol === 'https';
}

/**
 * Preference score for a video-capable format. Only meaningful when comparing
 * formats that share the same normalized height.
 */
export function scoreFormat(format: CandidateFormat, weights: ScoringWeights): number {
    let score = 0;

    if ((format.ext ?? '') === weights.preferredContainer) {
        score += weights.containerWeight;
    }
    if (isDirectProtocol(format.protocol)) {
        score += weights.directProtocolWeight;
    } else if (isManifestProtocol(format.protocol)) {
        score -= weights.manifestPenalty;
    }
    if (format.audioCodec) {
        score += weights.pairedAudioWeight;
    }

    score += (format.bitrate ?? 0) / weights.bitrateDivisor;
    score += (format.frameRate ?? 0) / weights.frameRateDivisor;

    return score;
}

export function scoreAudioFormat(format: CandidateFormat, weights: ScoringWeights, preferredContainer: string): number {
    const bitrate = format.audioBitrate ?? format.bitrate ?? 0;
    const bonus = format.ext === preferredContainer ? weights.audioContainerBonus : 0;
    return bitrate + bonus;
}
