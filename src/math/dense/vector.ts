/**
 * 🔢 向量實現 - Echelon 1.0
 *
 * 定長稠密向量，所有運算返回新向量
 * 作為方程行的法向量 (係數向量)
 */

import type { IVector } from '../../types/index';
import { DegenerateScaleError, DimensionMismatchError, EmptyCoefficientsError, IndexError } from '../../core/errors';
import { DEFAULT_EPSILON, NumericalSafety } from '../numerical/safety';

/**
 * 密集向量實現
 */
export class Vector implements IVector {
  private _data: number[];

  constructor(size: number, initialValue = 0) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new EmptyCoefficientsError('向量');
    }

    this._data = new Array<number>(size).fill(initialValue);
  }

  get size(): number {
    return this._data.length;
  }

  /**
   * 獲取元素
   */
  get(index: number): number {
    this._validateIndex(index);
    return this._data[index]!;
  }

  /**
   * 向量的 2-範數
   */
  norm(): number {
    let sum = 0;
    for (const value of this._data) {
      sum += value * value;
    }
    return Math.sqrt(sum);
  }

  /**
   * 向量點積
   */
  dot(other: IVector): number {
    this._validateSize(other);

    let sum = 0;
    for (let i = 0; i < this.size; i++) {
      sum += this.get(i) * other.get(i);
    }
    return sum;
  }

  /**
   * 轉換為陣列
   */
  toArray(): number[] {
    return [...this._data];
  }

  /**
   * 向量加法: this + other
   */
  plus(other: IVector): Vector {
    this._validateSize(other);
    return Vector.from(this._data.map((value, i) => value + other.get(i)));
  }

  /**
   * 向量減法: this - other
   */
  minus(other: IVector): Vector {
    this._validateSize(other);
    return Vector.from(this._data.map((value, i) => value - other.get(i)));
  }

  /**
   * 標量乘法: scalar * this
   */
  scale(scalar: number): Vector {
    return Vector.from(this._data.map(value => scalar * value));
  }

  /**
   * 單位向量
   */
  normalize(): Vector {
    const magnitude = this.norm();
    if (NumericalSafety.isNearZero(magnitude)) {
      throw new DegenerateScaleError(magnitude, '零向量無法單位化');
    }
    return this.scale(1 / magnitude);
  }

  /**
   * 夾角 (弧度)，inDegrees 為 true 時返回角度
   */
  angleWith(other: IVector, inDegrees = false): number {
    const otherVector = Vector.from(other.toArray());
    const cosine = this.normalize().dot(otherVector.normalize());
    // 舍入可能讓 |cos| 略大於 1
    const radians = Math.acos(Math.min(1, Math.max(-1, cosine)));
    return inDegrees ? radians * 180 / Math.PI : radians;
  }

  /**
   * 零向量檢測
   */
  isZero(tolerance = DEFAULT_EPSILON): boolean {
    return this.norm() < tolerance;
  }

  /**
   * 平行: 夾角為 0 或 π。零向量與任何向量平行
   */
  isParallel(other: IVector, tolerance = DEFAULT_EPSILON): boolean {
    this._validateSize(other);
    if (this.isZero(tolerance) || other.isZero(tolerance)) {
      return true;
    }

    const cosine = this.normalize().dot(Vector.from(other.toArray()).normalize());
    return Math.abs(Math.abs(cosine) - 1) < tolerance;
  }

  /**
   * 正交: 點積近零
   */
  isOrthogonal(other: IVector, tolerance = DEFAULT_EPSILON): boolean {
    return Math.abs(this.dot(other)) < tolerance;
  }

  /**
   * 逐元素比較
   */
  equals(other: IVector, tolerance = DEFAULT_EPSILON): boolean {
    if (other.size !== this.size) {
      return false;
    }
    return this._data.every((value, i) => Math.abs(value - other.get(i)) < tolerance);
  }

  toString(): string {
    return `Vector: (${this._data.join(', ')})`;
  }

  /**
   * 從陣列創建向量
   */
  static from(array: readonly number[]): Vector {
    const vector = new Vector(array.length);
    vector._data = [...array];
    return vector;
  }

  /**
   * 零向量
   */
  static zeros(size: number): Vector {
    return new Vector(size, 0);
  }

  /**
   * 標準基向量
   */
  static basis(size: number, index: number): Vector {
    const vector = Vector.zeros(size);
    vector._validateIndex(index);
    vector._data[index] = 1;
    return vector;
  }

  private _validateIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new IndexError(index, this.size);
    }
  }

  private _validateSize(other: IVector): void {
    if (other.size !== this.size) {
      throw new DimensionMismatchError(this.size, other.size, '向量維度不匹配');
    }
  }
}
