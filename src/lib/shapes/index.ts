/**
 * Shapes library
 *
 * Variant registry and contour generators for the stock shape variants.
 */

export {
  makeCircleLoop,
  makeEllipseLoop,
  makeHoleRing,
  makeHoleRow,
  makeLineLoop,
  makePolygonLoop,
  makeRectLoop,
  makeStarLoop,
} from './shape-generators';
export { VariantRegistry, variantRegistry, resolveContours } from './variant-registry';
export type { VariantDefinition } from './variant-registry';
export { registerBuiltinVariants, registerShapeVariants, SHAPE_DEFAULT_EASING } from './builtin-variants';
