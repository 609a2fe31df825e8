/**
 * Morph Cache
 *
 * LRU memo table for prepared contour pairs. Keys are structural: two inputs
 * with the same geometry and strategy parameters share one entry, and a key is
 * only ever stored with the value computed from it.
 */

import { createLogger } from '@/lib/logger';
import type { AlignmentContext, MorphPair } from '@/types/morphing';
import type { ContourLoop, ContourSet } from '@/types/geometry';

const log = createLogger('MorphCache');

export interface MorphCacheStats {
  entries: number;
  hits: number;
  misses: number;
  evictions: number;
}

function loopKey(loop: ContourLoop): string {
  const coords = loop.points.map((p) => `${p.x},${p.y}`).join(';');
  return `${loop.closed ? 'c' : 'o'}[${coords}]`;
}

function contoursKey(contours: ContourSet): string {
  return [loopKey(contours.outer), ...contours.holes.map(loopKey)].join('|');
}

/**
 * Structural key of a morph request
 */
export function generateMorphKey(
  source: ContourSet,
  destination: ContourSet,
  context: Pick<AlignmentContext, 'rotation1' | 'rotation2'>,
  strategyKey: string
): string {
  return `${strategyKey}#${context.rotation1}:${context.rotation2}#${contoursKey(source)}=>${contoursKey(destination)}`;
}

export class MorphCache {
  private readonly entries: Map<string, MorphPair> = new Map();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly maxEntries = 256) {}

  get(key: string): MorphPair | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  set(key: string, value: MorphPair): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
    this.entries.set(key, Object.freeze(value));
  }

  /**
   * Return the cached pair for `key`, computing and storing it on a miss
   */
  getOrCreate(key: string, create: () => MorphPair): MorphPair {
    const cached = this.get(key);
    if (cached) return cached;
    log.debug('Preparing contour pair', { entries: this.entries.size });
    const value = create();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): MorphCacheStats {
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}

/**
 * Create a new morph cache
 */
export function createMorphCache(maxEntries?: number): MorphCache {
  return new MorphCache(maxEntries);
}
