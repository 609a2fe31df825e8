/**
 * Timeline feature - public API
 *
 * Keystate resolution, attribute timelines and JSON timeline documents.
 */

export { parseKeyState, resolveTimeline } from './utils/keystate-parser';
export { createAttributeTrack, createAttributeTracks, sampleAttributeTrack } from './utils/attribute-timeline';
export type {
  AttributeKeyframe,
  AttributeKeyframeInput,
  AttributeTimelines,
  AttributeTrack,
  RawAttributeKeyframe,
} from './utils/attribute-timeline';
export { parseTimelineDocument, parseTimelineJson, timelineDocumentSchema } from './utils/timeline-document';
export type { TimelineDocument } from './utils/timeline-document';
export { fillMissingTimes, findSegmentIndex, localProgress } from './utils/time-spacing';
