/**
 * Maps a task's Bloom level to the cheapest model tier that can handle it.
 *
 * Everything here is a pure function of the configuration and the request.
 */

import { InvalidBloomLevelError } from '@/errors';
import type { CapabilityConfig } from './capabilityConfig';

export const MAX_BLOOM_LEVEL = 6;

type Tier = CapabilityConfig['tiers'][number];

export function assertBloomLevel(level: unknown): asserts level is number {
    if (typeof level !== 'number' || !Number.isInteger(level) || level < 1 || level > MAX_BLOOM_LEVEL) {
        throw new InvalidBloomLevelError(level);
    }
}

/**
 * Highest Bloom level a model handles. Models missing from the table, or a
 * missing table, count as unbounded.
 */
export function capability(config: CapabilityConfig | null, modelId: string): number {
    const tier = config?.tiers.find(t => t.modelId === modelId);
    return tier ? tier.max_bloom : MAX_BLOOM_LEVEL;
}

function costRank(config: CapabilityConfig, group: string): number {
    const index = config.costGroupOrder.indexOf(group);
    return index === -1 ? config.costGroupOrder.length : index;
}

/**
 * Picks among tiers sharing the same max_bloom: preferred cost group first,
 * declaration order after that.
 */
function breakTie(config: CapabilityConfig, tiers: Tier[]): Tier {
    return tiers
        .map((tier, index) => ({ tier, index }))
        .sort((a, b) => costRank(config, a.tier.cost_group) - costRank(config, b.tier.cost_group) || a.index - b.index)[0].tier;
}

/**
 * Recommended model for a task of the given level, or null when routing is
 * not configured.
 *
 * The cheapest sufficient tier is the one with the smallest max_bloom that
 * still covers the level. When nothing covers it, the strongest tier is
 * returned as a best effort.
 */
export function recommend(config: CapabilityConfig | null, bloomLevel: number): string | null {
    assertBloomLevel(bloomLevel);

    if (!config || config.tiers.length === 0) {
        return null;
    }

    const sufficient = config.tiers.filter(tier => tier.max_bloom >= bloomLevel);
    const pool = sufficient.length > 0 ? sufficient : config.tiers;
    const target = sufficient.length > 0
        ? Math.min(...pool.map(tier => tier.max_bloom))
        : Math.max(...pool.map(tier => tier.max_bloom));

    return breakTie(config, pool.filter(tier => tier.max_bloom === target)).modelId;
}

export function findTier(config: CapabilityConfig | null, modelId: string): Tier | undefined {
    return config?.tiers.find(tier => tier.modelId === modelId);
}
