import type { MediaKind, PlannerPolicy } from './types';

const GENERIC_KEYWORD = /^(best|worst|b|w)(video|audio|v|a)?\*?$/i;
const SELECTOR_OPERATORS = /[+/[\](),*]/;

export const UNCONDITIONAL_SELECTOR = 'best';

/** True when the selector is an expression rather than a single format id. */
export function isGenericSelector(selector: string): boolean {
    const trimmed = selector.trim();
    return GENERIC_KEYWORD.test(trimmed) || SELECTOR_OPERATORS.test(trimmed);
}

/**
 * Ordered selectors to try for one download, from the caller's choice down to
 * `best`. Format ids returned by an earlier fetch may no longer be selectable,
 * so every plan degrades to generic expressions.
 */
export function planSelectors(selector: string, kind: MediaKind, policy: PlannerPolicy): string[] {
    const requested = selector.trim();
    const plan: string[] = [];

    if (requested === UNCONDITIONAL_SELECTOR) {
        return [UNCONDITIONAL_SELECTOR];
    }

    if (kind === 'audio') {
        plan.push(
            requested,
            `bestaudio[ext=${policy.audioContainer}]`,
            'bestaudio',
        );
        return unique(plan);
    }

    if (requested && !isGenericSelector(requested)) {
        plan.push(`${requested}+bestaudio/best`, `${requested}/best`);
    } else {
        plan.push(requested);
    }

    plan.push(
        `bestvideo[ext=${policy.videoContainer}]+bestaudio[ext=${policy.audioContainer}]/best[ext=${policy.videoContainer}]`,
        'bestvideo+bestaudio/best',
    );

    return unique(plan);
}

// First occurrence wins, except `best`, which always closes the plan.
function unique(selectors: string[]): string[] {
    const seen = new Set<string>([UNCONDITIONAL_SELECTOR]);
    const result: string[] = [];
    for (const selector of selectors) {
        if (!selector || seen.has(selector)) continue;
        seen.add(selector);
        result.push(selector);
    }
    result.push(UNCONDITIONAL_SELECTOR);
    return result;
}
