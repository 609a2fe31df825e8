/**
 * Attribute timelines: per-attribute keyframe lists on an animated entity.
 * A track overrides the keystate-driven value of its attribute at every instant.
 */

import { applyEasing, isEasingName } from '@/features/easing/utils/easing';
import { interpolateValue } from '@/features/interpolation/utils/value-interpolation';
import { InvalidTimelineError } from '@/lib/errors';
import { isAttributeValue, isEasingFunction, isRecord } from '@/lib/guards';
import type { EasingSpec } from '@/types/easing';
import type { AttributeValue } from '@/types/snapshot';
import { fillMissingTimes, findNonIncreasing, findSegmentIndex, localProgress } from './time-spacing';

export interface AttributeKeyframeInput {
  time?: number;
  value: AttributeValue;
  /** Easing into this keyframe; linear when absent */
  easing?: EasingSpec;
}

/** A value, a `[time, value]` pair or a keyframe record */
export type RawAttributeKeyframe = AttributeValue | readonly [number, AttributeValue] | AttributeKeyframeInput;

export interface AttributeKeyframe {
  readonly time: number;
  readonly value: AttributeValue;
  readonly easing: EasingSpec | undefined;
}

export interface AttributeTrack {
  readonly attribute: string;
  /** Sorted keyframes spanning exactly [0, 1] */
  readonly keyframes: readonly AttributeKeyframe[];
}

export type AttributeTimelines = Readonly<Record<string, readonly RawAttributeKeyframe[]>>;

interface ParsedAttributeKeyframe {
  time: number | undefined;
  value: AttributeValue;
  easing: EasingSpec | undefined;
}

function trackError(attribute: string, message: string, index: number): InvalidTimelineError {
  return new InvalidTimelineError(`attribute "${attribute}": ${message}`, index);
}

function parseEntry(attribute: string, entry: unknown, index: number): ParsedAttributeKeyframe {
  if (Array.isArray(entry)) {
    const [time, value] = entry;
    if (entry.length !== 2 || typeof time !== 'number' || !isAttributeValue(value)) {
      throw trackError(attribute, 'a timed entry must be a [time, value] pair', index);
    }
    return { time, value, easing: undefined };
  }

  if (isRecord(entry) && 'value' in entry) {
    const { time, value, easing } = entry;
    if (!isAttributeValue(value)) {
      throw trackError(attribute, 'keyframe value is not an attribute value', index);
    }
    let keyTime: number | undefined;
    if (typeof time === 'number') keyTime = time;
    else if (time !== undefined) throw trackError(attribute, 'keyframe time must be a number', index);
    let spec: EasingSpec | undefined;
    if (isEasingFunction(easing) || (typeof easing === 'string' && isEasingName(easing))) {
      spec = easing;
    } else if (easing !== undefined) {
      throw trackError(attribute, `unknown easing ${JSON.stringify(easing)}`, index);
    }
    return { time: keyTime, value, easing: spec };
  }

  if (isAttributeValue(entry)) {
    return { time: undefined, value: entry, easing: undefined };
  }

  throw trackError(attribute, 'entry is not a value, a [time, value] pair or a keyframe record', index);
}

/**
 * Build a track from raw entries. Untimed entries are spaced like keystates;
 * the first and last values are held out to 0 and 1.
 */
export function createAttributeTrack(attribute: string, entries: readonly unknown[]): AttributeTrack {
  if (entries.length === 0) {
    throw new InvalidTimelineError(`attribute "${attribute}": a track needs at least one keyframe`);
  }

  const parsed = entries.map((entry, index) => parseEntry(attribute, entry, index));
  const times = fillMissingTimes(parsed.map((entry) => entry.time));

  times.forEach((time, index) => {
    if (!Number.isFinite(time) || time < 0 || time > 1) {
      throw trackError(attribute, `time ${time} is outside [0, 1]`, index);
    }
  });
  const offending = findNonIncreasing(times);
  if (offending !== -1) {
    throw trackError(attribute, 'times must be strictly increasing', offending);
  }

  const keyframes: AttributeKeyframe[] = parsed.map((entry, i) => ({
    time: times[i] ?? 0,
    value: entry.value,
    easing: entry.easing,
  }));

  const first = keyframes[0]!;
  const last = keyframes[keyframes.length - 1]!;
  if (first.time > 0) keyframes.unshift({ time: 0, value: first.value, easing: undefined });
  if (last.time < 1) keyframes.push({ time: 1, value: last.value, easing: undefined });

  return Object.freeze({ attribute, keyframes: Object.freeze(keyframes) });
}

export function createAttributeTracks(timelines: AttributeTimelines = {}): AttributeTrack[] {
  return Object.entries(timelines).map(([attribute, entries]) => createAttributeTrack(attribute, entries));
}

/**
 * Value of a track at global time `t`
 */
export function sampleAttributeTrack(
  track: AttributeTrack,
  t: number,
  options: { angular?: boolean } = {}
): AttributeValue {
  const { keyframes } = track;
  const first = keyframes[0]!;
  const last = keyframes[keyframes.length - 1]!;
  if (keyframes.length === 1 || Number.isNaN(t) || t <= first.time) return first.value;
  if (t >= last.time) return last.value;

  const index = findSegmentIndex(
    keyframes.map((keyframe) => keyframe.time),
    t
  );
  const from = keyframes[index]!;
  const to = keyframes[index + 1]!;
  const progress = applyEasing(localProgress(from.time, to.time, t), to.easing ?? 'linear');
  return interpolateValue(from.value, to.value, progress, options);
}
