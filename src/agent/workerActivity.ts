/**
 * Infers what a worker is doing from the tail of its pane.
 *
 * Only the last few lines count: finished turns leave "Working…" style lines
 * in the scroll-back, and scanning further up keeps reporting busy long after
 * the CLI went back to its prompt.
 *
 * Rules are checked top to bottom and the first match wins. Idle prompts come
 * before busy markers on purpose: some CLIs print a fresh prompt directly
 * under a stale busy line, and the prompt is the one that is current.
 */

import { CLI_FAMILY_PROFILES, CLI_FAMILIES } from './cliFamilies';

export type WorkerActivity = 'busy' | 'idle' | 'absent';

export interface ActivityRule {
    name: string;
    test: (tail: string) => boolean;
    activity: Exclude<WorkerActivity, 'absent'>;
}

export const TAIL_LINE_COUNT = 5;

const BUSY_PHRASES = /(Working|Thinking|Planning|Sending|task is in progress|Compacting conversation|thought for|思考中|考え中|計画中|送信中|処理中|実行中)/i;

function matchesAny(patterns: RegExp[]): (tail: string) => boolean {
    return tail => patterns.some(pattern => pattern.test(tail));
}

export const ACTIVITY_RULES: readonly ActivityRule[] = [
    ...CLI_FAMILIES.map((family): ActivityRule => ({
        name: `${family} idle prompt`,
        test: matchesAny(CLI_FAMILY_PROFILES[family].idlePatterns),
        activity: 'idle',
    })),
    {
        name: 'interrupt hint',
        test: tail => tail.toLowerCase().includes('esc to interrupt'),
        activity: 'busy',
    },
    {
        name: 'background terminal',
        test: tail => tail.toLowerCase().includes('background terminal running'),
        activity: 'busy',
    },
    {
        name: 'busy phrase',
        test: tail => BUSY_PHRASES.test(tail),
        activity: 'busy',
    },
];

/**
 * Keeps the last `TAIL_LINE_COUNT` lines, ignoring the blank padding tmux
 * leaves under the cursor.
 */
export function extractTail(capture: string | readonly string[]): string[] {
    const lines = typeof capture === 'string' ? capture.split(/\r?\n/) : [...capture];
    while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
        lines.pop();
    }
    return lines.slice(-TAIL_LINE_COUNT);
}

export function classifyWorkerActivity(
    capture: string | readonly string[] | null | undefined,
    rules: readonly ActivityRule[] = ACTIVITY_RULES
): WorkerActivity {
    if (capture === null || capture === undefined) {
        return 'absent';
    }

    const tail = extractTail(capture);
    if (tail.length === 0) {
        return 'absent';
    }

    const text = tail.join('\n');
    for (const rule of rules) {
        if (rule.test(text)) {
            return rule.activity;
        }
    }
    return 'idle';
}

export function activityLabel(activity: WorkerActivity): string {
    switch (activity) {
        case 'busy': return 'working';
        case 'idle': return 'waiting';
        case 'absent': return 'missing';
    }
}
