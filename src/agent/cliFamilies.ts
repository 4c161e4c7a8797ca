/**
 * The interactive CLIs a worker can be driving, and what differs between them.
 */

export const CLI_FAMILIES = ['claude', 'codex'] as const;

export type CliFamily = typeof CLI_FAMILIES[number];

export interface CliFamilyProfile {
    /** Lines matching any of these mean the CLI is waiting for input */
    idlePatterns: RegExp[];
    /** Slash command that drops the conversation and starts a fresh context */
    resetCommand: string;
    /** Builds the in-band command that switches the active model */
    modelSwitchCommand: (modelId: string) => string;
}

export const CLI_FAMILY_PROFILES: Record<CliFamily, CliFamilyProfile> = {
    claude: {
        // Bare prompt glyph with nothing typed after it
        idlePatterns: [/^(❯|›)\s*$/m],
        resetCommand: '/clear',
        modelSwitchCommand: modelId => `/model ${modelId}`,
    },
    codex: {
        idlePatterns: [/\? for shortcuts/, /context left/],
        resetCommand: '/new',
        modelSwitchCommand: modelId => `/model ${modelId}`,
    },
};
