import { describe, expect, it } from 'vitest';
import { rgba } from '@/lib/color';
import { InvalidTimelineError } from '@/lib/errors';
import { createAttributeTrack, createAttributeTracks, sampleAttributeTrack } from './attribute-timeline';

describe('createAttributeTrack', () => {
  it('spaces plain values across 0-1', () => {
    const track = createAttributeTrack('x', [0, 50, 100]);
    expect(track.keyframes.map((k) => [k.time, k.value])).toEqual([
      [0, 0],
      [0.5, 50],
      [1, 100],
    ]);
  });

  it('holds the first and last values out to the ends', () => {
    const track = createAttributeTrack('x', [
      [0.25, 10],
      [0.75, 20],
    ]);
    expect(track.keyframes.map((k) => [k.time, k.value])).toEqual([
      [0, 10],
      [0.25, 10],
      [0.75, 20],
      [1, 20],
    ]);
  });

  it('accepts keyframe records with easing', () => {
    const track = createAttributeTrack('opacity', [{ value: 0 }, { value: 1, easing: 'ease-in' }]);
    expect(track.keyframes[1]?.easing).toBe('ease-in');
  });

  it('rejects bad entries with the attribute and index', () => {
    expect(() => createAttributeTrack('x', [0, { value: 1, easing: 'wobble' }])).toThrow(
      'Keystate 1: attribute "x": unknown easing "wobble"'
    );
    expect(() => createAttributeTrack('x', [[0.5, 1], [0.5, 2]])).toThrow(InvalidTimelineError);
    expect(() => createAttributeTrack('x', [])).toThrow(InvalidTimelineError);
  });

  it('builds one track per attribute', () => {
    const tracks = createAttributeTracks({ x: [0, 1], fill: ['red', 'blue'] });
    expect(tracks.map((track) => track.attribute)).toEqual(['x', 'fill']);
  });
});

describe('sampleAttributeTrack', () => {
  it('interpolates numbers linearly by default', () => {
    const track = createAttributeTrack('x', [0, 100]);
    expect(sampleAttributeTrack(track, 0.25)).toBe(25);
    expect(sampleAttributeTrack(track, -1)).toBe(0);
    expect(sampleAttributeTrack(track, 2)).toBe(100);
  });

  it('treats NaN as the start of the track', () => {
    const track = createAttributeTrack('x', [
      [0.2, 40],
      [1, 100],
    ]);
    expect(sampleAttributeTrack(track, Number.NaN)).toBe(40);
  });

  it('uses the destination keyframe easing', () => {
    const track = createAttributeTrack('x', [0, { value: 100, easing: (t: number) => t * t }]);
    expect(sampleAttributeTrack(track, 0.5)).toBe(25);
  });

  it('holds before the first timed keyframe', () => {
    const track = createAttributeTrack('x', [
      [0.5, 10],
      [1, 20],
    ]);
    expect(sampleAttributeTrack(track, 0.3)).toBe(10);
    expect(sampleAttributeTrack(track, 0.75)).toBe(15);
  });

  it('uses the shortest arc for angular tracks', () => {
    const track = createAttributeTrack('rotation', [350, 10]);
    expect(sampleAttributeTrack(track, 0.5, { angular: true })).toBe(0);
  });

  it('blends colors and steps strings', () => {
    const colors = createAttributeTrack('fill', [rgba(0, 0, 0), rgba(100, 200, 0)]);
    expect(sampleAttributeTrack(colors, 0.5)).toEqual(rgba(50, 100, 0));
    const labels = createAttributeTrack('label', ['a', 'b']);
    expect(sampleAttributeTrack(labels, 0.4)).toBe('a');
    expect(sampleAttributeTrack(labels, 0.6)).toBe('b');
  });
});
