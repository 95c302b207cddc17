/**
 * 🧪 與 numeric 稠密求解器交叉驗證
 */

import { describe, it, expect } from 'vitest';
import numeric from 'numeric';
import { DimensionMismatchError } from '../../../src/core/errors';
import { evaluateSolution } from '../../../src/core/system/solution';
import { SystemBuilder, expectVectorClose } from '../../utils/SystemBuilder';

describe('numeric 交叉驗證', () => {
  it('唯一解與 LU 分解結果一致', () => {
    const system = SystemBuilder.threePlanesPoint();
    const result = system.classifyAndSolve();
    const reference = numeric.solve(system.coefficientMatrix(), system.constants());

    expect(result.kind).toBe('unique');
    if (result.kind !== 'unique') return;
    expectVectorClose(result.values, reference, 10);
  });

  it('唯一解的殘差接近零', () => {
    const system = SystemBuilder.fourPlanes();
    const point = evaluateSolution(system.classifyAndSolve());

    expect(point).not.toBeNull();
    if (point === null) return;
    expect(system.residualNorm(point)).toBeLessThan(1e-9);
    expect(system.isSatisfiedBy(point)).toBe(true);
  });

  it('原點的殘差為 ‖b‖₂', () => {
    const system = SystemBuilder.threePlanesPoint();

    expect(system.residualNorm([0, 0, 0])).toBeCloseTo(Math.sqrt(14), 12);
    expect(system.isSatisfiedBy([0, 0, 0])).toBe(false);
  });

  it('參數解任意參數處殘差接近零', () => {
    const system = SystemBuilder.repeatedPlane();
    const result = system.classifyAndSolve();

    for (const parameters of [[0, 0], [1, -2], [-0.5, 3]]) {
      const point = evaluateSolution(result, parameters);
      expect(point).not.toBeNull();
      if (point === null) return;
      expect(system.residualNorm(point)).toBeLessThan(1e-9);
    }
  });

  it('解向量維度不匹配時拋出', () => {
    expect(() => SystemBuilder.threePlanesPoint().residualNorm([1, 2])).toThrow(DimensionMismatchError);
  });
});
