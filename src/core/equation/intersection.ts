/**
 * ✖️ 二維直線交點
 *
 * A x + B y = K1 與 C x + D y = K2:
 *   x = (D·K1 - B·K2) / (AD - BC)
 *   y = (A·K2 - C·K1) / (AD - BC)
 */

import { DEFAULT_EPSILON } from '../../math/numerical/safety';
import { DimensionMismatchError } from '../errors';
import type { EquationRow } from './equation_row';

export type LineIntersection =
  | { readonly kind: 'coincident' }
  | { readonly kind: 'parallel' }
  | { readonly kind: 'point'; readonly point: readonly [number, number] };

export function intersectLines(
  first: EquationRow,
  second: EquationRow,
  tolerance: number = DEFAULT_EPSILON
): LineIntersection {
  for (const line of [first, second]) {
    if (line.dimension !== 2) {
      throw new DimensionMismatchError(2, line.dimension, '直線交點只支持二維');
    }
  }

  if (first.isParallelTo(second, tolerance)) {
    return first.isSameAs(second, tolerance) ? { kind: 'coincident' } : { kind: 'parallel' };
  }

  const [a, b] = [first.coefficient(0), first.coefficient(1)];
  const [c, d] = [second.coefficient(0), second.coefficient(1)];
  const k1 = first.constant;
  const k2 = second.constant;

  const denominator = a * d - b * c;
  return {
    kind: 'point',
    point: [(d * k1 - b * k2) / denominator, (a * k2 - c * k1) / denominator],
  };
}
