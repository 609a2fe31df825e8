/**
 * Keystate Timeline Resolver
 *
 * Accepts bare snapshots, `[time, snapshot]` pairs and annotated records in
 * one list and resolves them into a frozen timeline with strictly increasing
 * times. All validation happens here, before any frame is computed.
 */

import { isEasingName } from '@/features/easing/utils/easing';
import { InvalidTimelineError } from '@/lib/errors';
import { isEasingFunction, isHoleMatcher, isRecord, isSnapshot, isVertexAligner } from '@/lib/guards';
import type { EasingMap, EasingSpec } from '@/types/easing';
import type { KeyState, ParsedKeyState, Timeline } from '@/types/keystate';
import type { AlignerId, HoleMatcherId, MorphingOverride } from '@/types/morphing';
import { fillMissingTimes, findNonIncreasing } from './time-spacing';

const HOLE_MATCHER_IDS: readonly HoleMatcherId[] = [
  'clustering',
  'greedy',
  'discrete',
  'simple',
  'optimal-assignment',
];
const ALIGNER_IDS: readonly AlignerId[] = ['angular', 'euclidean', 'none'];

function isHoleMatcherId(value: string): value is HoleMatcherId {
  return HOLE_MATCHER_IDS.some((id) => id === value);
}

function isAlignerId(value: string): value is AlignerId {
  return ALIGNER_IDS.some((id) => id === value);
}

function parseTime(value: unknown, index: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidTimelineError(`time must be a finite number, got ${String(value)}`, index);
  }
  if (value < 0 || value > 1) {
    throw new InvalidTimelineError(`time ${value} is outside [0, 1]`, index);
  }
  return value;
}

function parseEasingMap(value: unknown, index: number): EasingMap {
  if (!isRecord(value)) {
    throw new InvalidTimelineError('easing must be a map of attribute name to easing', index);
  }
  const easing: Record<string, EasingSpec> = {};
  for (const [attribute, spec] of Object.entries(value)) {
    if (isEasingFunction(spec)) {
      easing[attribute] = spec;
    } else if (typeof spec === 'string' && isEasingName(spec)) {
      easing[attribute] = spec;
    } else {
      throw new InvalidTimelineError(`unknown easing ${JSON.stringify(spec)} for "${attribute}"`, index);
    }
  }
  return easing;
}

function parseMorphingOverride(value: unknown, index: number): MorphingOverride {
  if (!isRecord(value)) {
    throw new InvalidTimelineError('morphing override must be an object', index);
  }
  const override: MorphingOverride = {};
  const { holeMatcher, aligner } = value;

  if (holeMatcher !== undefined) {
    if (typeof holeMatcher === 'string' && isHoleMatcherId(holeMatcher)) {
      override.holeMatcher = holeMatcher;
    } else if (isHoleMatcher(holeMatcher)) {
      override.holeMatcher = holeMatcher;
    } else {
      throw new InvalidTimelineError(`unknown hole matcher ${JSON.stringify(holeMatcher)}`, index);
    }
  }

  if (aligner !== undefined) {
    if (typeof aligner === 'string' && isAlignerId(aligner)) {
      override.aligner = aligner;
    } else if (isVertexAligner(aligner)) {
      override.aligner = aligner;
    } else {
      throw new InvalidTimelineError(`unknown aligner ${JSON.stringify(aligner)}`, index);
    }
  }

  return override;
}

/**
 * Reject a two-element entry whose second element is a number
 */
export function assertUnambiguousPair(entry: readonly unknown[], index: number): void {
  const [time, snapshot] = entry;
  if (entry.length === 2 && typeof snapshot === 'number') {
    throw new InvalidTimelineError(
      `ambiguous pair [${String(time)}, ${snapshot}]: the second element must be a snapshot`,
      index
    );
  }
}

/**
 * Detect the shape of one raw entry.
 * A pair whose second element is a number is ambiguous and rejected.
 */
export function parseKeyState(entry: unknown, index: number): ParsedKeyState {
  if (Array.isArray(entry)) {
    if (entry.length !== 2) {
      throw new InvalidTimelineError(`a timed entry must be a [time, snapshot] pair, got ${entry.length} elements`, index);
    }
    assertUnambiguousPair(entry, index);
    const [time, snapshot] = entry;
    if (!isSnapshot(snapshot)) {
      throw new InvalidTimelineError('the second element of a timed pair is not a snapshot', index);
    }
    return { kind: 'timed', time: parseTime(time, index), snapshot };
  }

  if (isSnapshot(entry)) {
    return { kind: 'bare', snapshot: entry };
  }

  if (isRecord(entry) && 'snapshot' in entry) {
    if (!isSnapshot(entry.snapshot)) {
      throw new InvalidTimelineError('record has no valid snapshot', index);
    }
    return {
      kind: 'annotated',
      snapshot: entry.snapshot,
      time: entry.time === undefined ? undefined : parseTime(entry.time, index),
      easing: entry.easing === undefined ? undefined : parseEasingMap(entry.easing, index),
      morphing: entry.morphing === undefined ? undefined : parseMorphingOverride(entry.morphing, index),
    };
  }

  throw new InvalidTimelineError('entry is neither a snapshot, a [time, snapshot] pair nor a keystate record', index);
}

function explicitTime(parsed: ParsedKeyState): number | undefined {
  return parsed.kind === 'bare' ? undefined : parsed.time;
}

/**
 * Resolve raw entries into a timeline.
 * @throws InvalidTimelineError for fewer than two entries, a malformed entry,
 * or times that are not strictly increasing after spacing
 */
export function resolveTimeline(entries: readonly unknown[]): Timeline {
  if (entries.length < 2) {
    throw new InvalidTimelineError(`a timeline needs at least two keystates, got ${entries.length}`);
  }

  const parsed = entries.map((entry, index) => parseKeyState(entry, index));
  const times = fillMissingTimes(parsed.map(explicitTime));

  const offending = findNonIncreasing(times);
  if (offending !== -1) {
    throw new InvalidTimelineError(
      `time ${times[offending]} does not come after ${times[offending - 1]}; times must be strictly increasing`,
      offending
    );
  }

  const keystates = parsed.map((entry, i): KeyState =>
    Object.freeze({
      time: times[i] ?? 0,
      snapshot: entry.snapshot,
      easing: Object.freeze(entry.kind === 'annotated' ? (entry.easing ?? {}) : {}),
      morphing: entry.kind === 'annotated' ? entry.morphing : undefined,
    })
  );

  return Object.freeze({ keystates: Object.freeze(keystates) });
}
