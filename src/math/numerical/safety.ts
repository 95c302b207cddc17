/**
 * 🔢 數值穩定性工具 - Echelon 1.0
 *
 * 近零判斷、有效性檢查與受保護的除法
 * 所有「這個係數是否實際為零」的判斷都經由這裡
 */

import { DegenerateScaleError, InvalidNumberError } from '../../core/errors';

/**
 * 默認近零容差 ε
 */
export const DEFAULT_EPSILON = 1e-10;

/**
 * 🔍 數值有效性檢查
 */
export namespace NumericalSafety {

  /**
   * 檢查數值是否有效（非 NaN 且有限）
   */
  export function isValidNumber(value: number): boolean {
    return Number.isFinite(value);
  }

  /**
   * 近零判斷: |value| < ε
   */
  export function isNearZero(value: number, epsilon: number = DEFAULT_EPSILON): boolean {
    return Math.abs(value) < epsilon;
  }

  /**
   * 檢查數值有效，否則拋出 InvalidNumberError
   */
  export function requireValidNumber(value: number, context?: string): number {
    if (!isValidNumber(value)) {
      throw new InvalidNumberError(value, context);
    }
    return value;
  }

  /**
   * 除法，除數近零時視為程序錯誤
   */
  export function guardedDivide(
    numerator: number,
    denominator: number,
    epsilon: number = DEFAULT_EPSILON,
    context = '除法'
  ): number {
    if (isNearZero(denominator, epsilon)) {
      throw new DegenerateScaleError(denominator, context);
    }
    return numerator / denominator;
  }

  /**
   * 相對容差檢查
   */
  export function isNearlyEqual(
    a: number,
    b: number,
    relativeTolerance: number = 1e-9,
    absoluteTolerance: number = DEFAULT_EPSILON
  ): boolean {
    if (!isValidNumber(a) || !isValidNumber(b)) {
      return false;
    }

    const diff = Math.abs(a - b);
    const maxValue = Math.max(Math.abs(a), Math.abs(b));

    return diff <= absoluteTolerance || diff <= relativeTolerance * maxValue;
  }

  /**
   * 把近零的結果清為 0，消除 -0 與舍入噪聲
   */
  export function snapToZero(value: number, epsilon: number = DEFAULT_EPSILON): number {
    return isNearZero(value, epsilon) ? 0 : value;
  }
}
