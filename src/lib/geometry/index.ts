/**
 * Geometry helpers shared by alignment, hole matching and shape generation.
 */

export {
  createLoop,
  createContourSet,
  createZeroLoop,
  distance,
  lerpPoint,
  loopBounds,
  loopCentroid,
  loopLength,
  meanPoint,
  reverseLoop,
  rotateLoop,
  rotatePoint,
  rotatePoints,
  scaleLoop,
  shiftPoints,
  signedArea,
  translateLoop,
} from './loop-utils';
export { resampleLoop } from './resample';
export { aggregate, argMin, pairedDistance } from './norms';
export { solveAssignment } from './assignment';
export { createSeededRandom } from './random';
export { balanceClusters, clusterMembers, kMeans } from './kmeans';
export type { KMeansOptions, KMeansResult } from './kmeans';
