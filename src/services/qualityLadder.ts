import { normalizeHeight, toCandidateFormat } from './formatNormalizer';
import { scoreAudioFormat, scoreFormat } from './formatScorer';
import type { CandidateFormat, LadderPolicy, QualityOption } from './types';

export const BEST_AVAILABLE_LABEL = 'Best Available';
export const AUDIO_ONLY_LABEL = 'Audio Only';
export const BEST_AVAILABLE_SELECTOR = 'bestvideo+bestaudio/best';
export const BEST_AUDIO_SELECTOR = 'bestaudio/best';

/**
 * Builds the list of quality options shown to the user from the engine's raw
 * format list: one entry per video height (best representative only), then the
 * generic "Best Available" row, then exactly one audio row.
 */
export function buildQualityLadder(rawFormats: readonly unknown[] | undefined, policy: LadderPolicy): QualityOption[] {
    const formats = (rawFormats ?? [])
        .map(toCandidateFormat)
        .filter((format): format is CandidateFormat => format !== null);

    const videoFormats = formats.filter(format => Boolean(format.videoCodec));
    const audioFormats = formats.filter(format => !format.videoCodec && Boolean(format.audioCodec));

    const options: QualityOption[] = [
        ...buildVideoOptions(videoFormats, policy),
        {
            label: BEST_AVAILABLE_LABEL,
            selector: BEST_AVAILABLE_SELECTOR,
            kind: 'video',
            height: 0,
        },
        buildAudioOption(audioFormats, policy),
    ];

    return dedupeByLabel(options);
}

function buildVideoOptions(formats: CandidateFormat[], policy: LadderPolicy): QualityOption[] {
    const byHeight = new Map<number, { format: CandidateFormat; score: number }>();

    for (const format of formats) {
        const height = normalizeHeight(format);
        if (height === undefined || height < policy.minHeight) {
            continue;
        }
        const score = scoreFormat(format, policy.scoring);
        const current = byHeight.get(height);
        if (!current || score > current.score) {
            byHeight.set(height, { format, score });
        }
    }

    return [...byHeight.entries()]
        .sort(([a], [b]) => b - a)
        .map(([height, { format }]) => ({
            label: `${height}p`,
            selector: format.formatId,
            kind: 'video' as const,
            height,
        }));
}

function buildAudioOption(formats: CandidateFormat[], policy: LadderPolicy): QualityOption {
    let best: { format: CandidateFormat; score: number } | undefined;
    for (const format of formats) {
        const score = scoreAudioFormat(format, policy.scoring, policy.preferredAudioContainer);
        if (!best || score > best.score) {
            best = { format, score };
        }
    }

    return {
        label: AUDIO_ONLY_LABEL,
        selector: best ? best.format.formatId : BEST_AUDIO_SELECTOR,
        kind: 'audio',
        height: 0,
    };
}

function dedupeByLabel(options: QualityOption[]): QualityOption[] {
    const seen = new Set<string>();
    return options.filter(option => {
        if (seen.has(option.label)) return false;
        seen.add(option.label);
        return true;
    });
}
