/**
 * 🔧 SystemBuilder - 測試方程組構建工具
 *
 * 提供程序化構建測試方程組的便捷方法
 * 支持鏈式調用和預定義經典方程組模板
 */

import { expect } from 'vitest';
import { EquationRow } from '../../src/core/equation/equation_row';
import { LinearSystem } from '../../src/core/system/linear_system';
import type { SolverOptions } from '../../src/types/index';

export type AugmentedRow = readonly number[];

export class SystemBuilder {
  private rows: EquationRow[] = [];

  /**
   * 添加一行: coefficients · x = constant
   */
  addRow(coefficients: readonly number[], constant: number): this {
    this.rows.push(EquationRow.of(coefficients, constant));
    return this;
  }

  /**
   * 添加增廣行，最後一個元素是常數項
   */
  addAugmented(...entries: AugmentedRow[]): this {
    for (const entry of entries) {
      this.addRow(entry.slice(0, -1), entry[entry.length - 1] ?? 0);
    }
    return this;
  }

  build(options?: SolverOptions): LinearSystem {
    return new LinearSystem(this.rows, options);
  }

  // === 經典方程組模板 ===

  /**
   * 四個平面，行階梯形最後一行為 0 = 0
   */
  static fourPlanes(): LinearSystem {
    return new SystemBuilder()
      .addAugmented([1, 1, 1, 1], [0, 1, 0, 2], [1, 1, -1, 3], [1, 0, -2, 2])
      .build();
  }

  /**
   * 三個平面交於 (23/9, 7/9, 2/9)，首行主元為零需要換行
   */
  static threePlanesPoint(): LinearSystem {
    return new SystemBuilder()
      .addAugmented([0, 1, 1, 1], [1, -1, 1, 2], [1, 2, -5, 3])
      .build();
  }

  /**
   * 係數成比例、常數不成比例的兩個平行平面
   */
  static parallelPlanes(): LinearSystem {
    return new SystemBuilder()
      .addAugmented([5.862, 1.178, -10.366, -8.15], [-2.931, -0.589, 5.183, -4.075])
      .build();
  }

  /**
   * 同一平面寫成兩行
   */
  static coincidentPlanes(): LinearSystem {
    return new SystemBuilder()
      .addAugmented([5.862, 1.178, -10.366, -8.15], [-2.931, -0.589, 5.183, 4.075])
      .build();
  }

  /**
   * 三個平面交於一條直線
   */
  static threePlanesLine(): LinearSystem {
    return new SystemBuilder()
      .addAugmented(
        [8.631, 5.112, -1.816, -5.113],
        [4.315, 11.132, -5.27, -6.775],
        [-2.158, 3.01, -1.727, -0.831]
      )
      .build();
  }

  /**
   * 四行都是同一平面
   */
  static repeatedPlane(): LinearSystem {
    return new SystemBuilder()
      .addAugmented(
        [0.935, 1.76, -9.365, -9.955],
        [0.187, 0.352, -1.873, -1.991],
        [0.374, 0.704, -3.746, -3.982],
        [-0.561, -1.056, 5.619, 5.973]
      )
      .build();
  }
}

/**
 * 逐元素比較方程組與期望的增廣矩陣
 */
export function expectRowsClose(system: LinearSystem, expected: readonly AugmentedRow[], digits = 10): void {
  expect(system.length).toBe(expected.length);
  expected.forEach((entries, i) => {
    const row = system.getRow(i);
    const actual = [...row.coefficients(), row.constant];
    expect(actual).toHaveLength(entries.length);
    entries.forEach((value, j) => {
      expect(actual[j]).toBeCloseTo(value, digits);
    });
  });
}

export function expectVectorClose(actual: readonly number[], expected: readonly number[], digits = 10): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, i) => {
    expect(actual[i]).toBeCloseTo(value, digits);
  });
}
