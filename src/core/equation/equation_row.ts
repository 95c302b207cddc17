/**
 * 📐 方程行 - Echelon 1.0
 *
 * 表示 coefficients · x = constant
 * 二維時為直線，三維時為平面，更高維時為超平面
 *
 * 不可變值對象：縮放與相加都返回新行，
 * LinearSystem 的行變換總是整行替換
 */

import type { IEquationRow } from '../../types/index';
import { Vector } from '../../math/dense/vector';
import { DEFAULT_EPSILON, NumericalSafety } from '../../math/numerical/safety';
import { DegenerateScaleError, DimensionMismatchError, EmptyCoefficientsError } from '../errors';
import { formatEquation } from './equation_formatter';

export class EquationRow implements IEquationRow {
  /** 法向量 (係數向量) */
  readonly normal: Vector;
  readonly constant: number;

  constructor(normal: Vector | readonly number[], constant = 0) {
    const coefficients = normal instanceof Vector ? normal.toArray() : [...normal];
    if (coefficients.length === 0) {
      throw new EmptyCoefficientsError();
    }

    coefficients.forEach((value, i) => NumericalSafety.requireValidNumber(value, `係數 x_${i + 1} `));
    NumericalSafety.requireValidNumber(constant, '常數項');

    this.normal = Vector.from(coefficients);
    this.constant = constant;
  }

  static of(coefficients: readonly number[], constant: number): EquationRow {
    return new EquationRow(coefficients, constant);
  }

  get dimension(): number {
    return this.normal.size;
  }

  coefficients(): number[] {
    return this.normal.toArray();
  }

  coefficient(index: number): number {
    return this.normal.get(index);
  }

  /**
   * 主元列: 第一個 |c| ≥ ε 的係數
   */
  firstNonzeroIndex(epsilon: number = DEFAULT_EPSILON): number | null {
    for (let i = 0; i < this.dimension; i++) {
      if (!NumericalSafety.isNearZero(this.normal.get(i), epsilon)) {
        return i;
      }
    }
    return null;
  }

  /**
   * 0 = 0
   */
  isTrivial(epsilon: number = DEFAULT_EPSILON): boolean {
    return this.firstNonzeroIndex(epsilon) === null && NumericalSafety.isNearZero(this.constant, epsilon);
  }

  /**
   * 0 = c, c ≠ 0
   */
  isInconsistent(epsilon: number = DEFAULT_EPSILON): boolean {
    return this.firstNonzeroIndex(epsilon) === null && !NumericalSafety.isNearZero(this.constant, epsilon);
  }

  scale(factor: number): EquationRow {
    return new EquationRow(this.normal.scale(factor), factor * this.constant);
  }

  /**
   * 整行除以 divisor。divisor 取主元值時主元恰為 1
   */
  divide(divisor: number, epsilon: number = DEFAULT_EPSILON): EquationRow {
    if (NumericalSafety.isNearZero(divisor, epsilon)) {
      throw new DegenerateScaleError(divisor, '行除法');
    }
    return new EquationRow(
      this.coefficients().map(value => value / divisor),
      this.constant / divisor
    );
  }

  /**
   * this + factor · other
   */
  plus(other: EquationRow, factor = 1): EquationRow {
    if (other.dimension !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, other.dimension, '方程行維度不匹配');
    }
    return new EquationRow(
      this.normal.plus(other.normal.scale(factor)),
      this.constant + factor * other.constant
    );
  }

  /**
   * 行上的一點: 主元列取 constant / pivot，其餘為 0。沒有主元時返回 null
   */
  basepoint(epsilon: number = DEFAULT_EPSILON): Vector | null {
    const pivot = this.firstNonzeroIndex(epsilon);
    if (pivot === null) {
      return null;
    }

    const coords = new Array<number>(this.dimension).fill(0);
    coords[pivot] = NumericalSafety.guardedDivide(this.constant, this.normal.get(pivot), epsilon, '基點');
    return Vector.from(coords);
  }

  isParallelTo(other: EquationRow, tolerance: number = DEFAULT_EPSILON): boolean {
    return this.normal.isParallel(other.normal, tolerance);
  }

  /**
   * 同一幾何對象: 平行且兩個基點之差與法向量正交
   */
  isSameAs(other: EquationRow, tolerance: number = DEFAULT_EPSILON): boolean {
    if (!this.isParallelTo(other, tolerance)) {
      return false;
    }

    const here = this.basepoint(tolerance);
    const there = other.basepoint(tolerance);
    if (here === null || there === null) {
      // 至少一行沒有主元: 只有兩行都是 0 = c 且常數一致才相同
      return here === null && there === null
        && NumericalSafety.isNearlyEqual(this.constant, other.constant, 1e-9, tolerance);
    }

    return here.minus(there).isOrthogonal(this.normal, tolerance);
  }

  /**
   * 逐元素相等 (係數與常數)
   */
  equals(other: EquationRow, tolerance: number = DEFAULT_EPSILON): boolean {
    return this.normal.equals(other.normal, tolerance)
      && Math.abs(this.constant - other.constant) < tolerance;
  }

  toString(): string {
    return formatEquation(this.coefficients(), this.constant);
  }
}
