/**
 * Shared pieces for keystate-generating transitions.
 */

import type { AttributeMap, Snapshot } from '@/types/snapshot';

/** A `[time, snapshot]` entry; accepted anywhere a raw keystate is */
export type TimedKeyState = readonly [number, Snapshot];

/**
 * Time between the last outgoing and first incoming keystate of an instant
 * switch. Timelines need strictly increasing times, so a switch cannot share one.
 */
export const SWITCH_GAP = 1e-6;

export function withAttributes(snapshot: Snapshot, patch: AttributeMap): Snapshot {
  return { variant: snapshot.variant, attributes: { ...snapshot.attributes, ...patch } };
}

export function numberAttribute(snapshot: Snapshot, name: string, fallback = 0): number {
  const value = snapshot.attributes[name];
  return typeof value === 'number' ? value : fallback;
}

/**
 * Clamp into [0, 1], sort, and push coinciding times apart by SWITCH_GAP.
 * Entries crowded against 1 are pushed back from the end instead.
 */
export function settleTimes(keystates: readonly TimedKeyState[]): TimedKeyState[] {
  const sorted = keystates
    .map(([time, snapshot]): TimedKeyState => [Math.min(1, Math.max(0, time)), snapshot])
    .sort((a, b) => a[0] - b[0]);

  const times = sorted.map(([time]) => time);
  for (let i = 1; i < times.length; i++) {
    times[i] = Math.max(times[i]!, times[i - 1]! + SWITCH_GAP);
  }
  const last = times.length - 1;
  if (last >= 0 && times[last]! > 1) {
    times[last] = 1;
    for (let i = last - 1; i >= 0; i--) {
      times[i] = Math.min(times[i]!, times[i + 1]! - SWITCH_GAP);
    }
  }

  return sorted.map(([, snapshot], i): TimedKeyState => [times[i]!, snapshot]);
}
