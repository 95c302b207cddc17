/**
 * 🚨 錯誤類型 - Echelon 1.0
 *
 * 只有畸形輸入才是錯誤；無解與自由變量屬於分類結果
 */

export type LinearSystemErrorCode =
  | 'DIMENSION_MISMATCH'
  | 'EMPTY_COEFFICIENTS'
  | 'DEGENERATE_SCALE'
  | 'ROW_INDEX'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVALID_NUMBER';

/**
 * 所有錯誤的基類，按 code 區分原因
 */
export abstract class LinearSystemError extends Error {
  abstract readonly code: LinearSystemErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 行或向量的維度不一致
 */
export class DimensionMismatchError extends LinearSystemError {
  override readonly code = 'DIMENSION_MISMATCH';

  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context = '維度不匹配'
  ) {
    super(`${context}: 期望 ${expected}，實際 ${actual}`);
  }
}

/**
 * 空係數列表或空行列表
 */
export class EmptyCoefficientsError extends LinearSystemError {
  override readonly code = 'EMPTY_COEFFICIENTS';

  constructor(what = '係數列表') {
    super(`${what}不能為空`);
  }
}

/**
 * 除以近零主元。消元步驟只選取非近零主元，出現即為程序錯誤
 */
export class DegenerateScaleError extends LinearSystemError {
  override readonly code = 'DEGENERATE_SCALE';

  constructor(public readonly value: number, context = '縮放') {
    super(`${context}: 除數近似為零 (${value})`);
  }
}

export class RowIndexError extends LinearSystemError {
  override readonly code = 'ROW_INDEX';

  constructor(public readonly index: number, public readonly length: number) {
    super(`行索引超出範圍: ${index} (行數: ${length})`);
  }
}

/**
 * 向量元素或係數的索引越界
 */
export class IndexError extends LinearSystemError {
  override readonly code = 'INDEX_OUT_OF_RANGE';

  constructor(public readonly index: number, public readonly size: number) {
    super(`索引超出範圍: ${index} (大小: ${size})`);
  }
}

/**
 * NaN 或 ±Infinity
 */
export class InvalidNumberError extends LinearSystemError {
  override readonly code = 'INVALID_NUMBER';

  constructor(public readonly value: number, context = '數值') {
    super(`${context}必須為有限數值: ${value}`);
  }
}

export function isLinearSystemError(error: unknown): error is LinearSystemError {
  return error instanceof LinearSystemError;
}
