import { readFile } from 'node:fs/promises';
import * as z from 'zod';
import { logger } from '@/ui/logger';

export const BloomLevelSchema = z.number().int().min(1).max(6);

export const CapabilityTierSchema = z.object({
    max_bloom: BloomLevelSchema,
    cost_group: z.string().min(1).default('default'),
    /** CLI family able to run this model. Unknown families never get a model switch */
    cli: z.string().min(1).optional(),
});

export type CapabilityTier = z.infer<typeof CapabilityTierSchema>;

export const RoutingModeSchema = z.enum(['auto', 'manual', 'off']);
export type RoutingMode = z.infer<typeof RoutingModeSchema>;

export const RoutingSettingsSchema = z.object({
    mode: RoutingModeSchema.default('auto'),
    /** Preferred cost groups, first wins ties. Groups not listed rank after listed ones */
    cost_group_order: z.array(z.string()).optional(),
});

export interface CapabilityConfig {
    /** Tiers in the order they were declared */
    tiers: Array<{ modelId: string } & CapabilityTier>;
    mode: RoutingMode;
    costGroupOrder: string[];
}

const CapabilitySectionSchema = z.object({
    capability_tiers: z.record(z.string(), CapabilityTierSchema).optional(),
    routing: RoutingSettingsSchema.optional(),
});

/**
 * Builds the routing table from the relevant part of a fleet file.
 *
 * Returns null whenever routing cannot be configured: no tier table, an empty
 * one, or anything that fails validation. Callers treat null as "routing
 * disabled", never as an error.
 */
export function parseCapabilityConfig(raw: unknown): CapabilityConfig | null {
    const parsed = CapabilitySectionSchema.safeParse(raw);
    if (!parsed.success) {
        logger.debug('[ROUTING] Ignoring malformed capability configuration:', parsed.error.issues);
        return null;
    }

    const table = parsed.data.capability_tiers;
    if (!table || Object.keys(table).length === 0) {
        return null;
    }

    const tiers = Object.entries(table).map(([modelId, tier]) => ({ modelId, ...tier }));

    const declaredGroups: string[] = [];
    for (const tier of tiers) {
        if (!declaredGroups.includes(tier.cost_group)) {
            declaredGroups.push(tier.cost_group);
        }
    }

    return {
        tiers,
        mode: parsed.data.routing?.mode ?? 'auto',
        costGroupOrder: parsed.data.routing?.cost_group_order ?? declaredGroups,
    };
}

export async function loadCapabilityConfig(file: string): Promise<CapabilityConfig | null> {
    try {
        const content = await readFile(file, 'utf-8');
        return parseCapabilityConfig(JSON.parse(content));
    } catch (error) {
        logger.debug(`[ROUTING] No usable capability configuration at ${file}:`, error);
        return null;
    }
}
