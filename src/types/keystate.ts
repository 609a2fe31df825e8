/**
 * Keystate and timeline types.
 */

import type { EasingMap } from './easing';
import type { MorphingOverride } from './morphing';
import type { Snapshot } from './snapshot';

/**
 * Fully annotated keystate as supplied by the caller.
 * Without a time, the entry is spaced between its timed neighbours.
 */
export interface KeyStateInput {
  snapshot: Snapshot;
  /** Normalized time (0-1) */
  time?: number;
  /** Easing used when interpolating INTO this keystate, per attribute */
  easing?: EasingMap;
  /** Strategy override for the segment ending at this keystate */
  morphing?: MorphingOverride;
}

/** Any admissible raw timeline entry */
export type RawKeyState = Snapshot | readonly [number, Snapshot] | KeyStateInput;

/** Raw entries after shape detection, before times are assigned */
export type ParsedKeyState =
  | { kind: 'bare'; snapshot: Snapshot }
  | { kind: 'timed'; time: number; snapshot: Snapshot }
  | {
      kind: 'annotated';
      time: number | undefined;
      snapshot: Snapshot;
      easing: EasingMap | undefined;
      morphing: MorphingOverride | undefined;
    };

export interface KeyState {
  readonly time: number;
  readonly snapshot: Snapshot;
  readonly easing: EasingMap;
  readonly morphing: MorphingOverride | undefined;
}

/** At least two keystates with strictly increasing times */
export interface Timeline {
  readonly keystates: readonly KeyState[];
}
