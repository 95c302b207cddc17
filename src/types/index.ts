/**
 * 🎯 Echelon 核心類型定義
 *
 * 稠密線性方程組的類型系統
 * 方程行、線性系統與解集分類結果
 */

// 基礎數值類型
export type Coefficient = number;
export type Constant = number;
export type ColumnIndex = number;
export type RowIndex = number;

// 向量接口
export interface IVector {
  readonly size: number;

  get(index: number): number;

  norm(): number;
  dot(other: IVector): number;

  // 向量運算 (消元與幾何判斷需要)
  plus(other: IVector): IVector;
  minus(other: IVector): IVector;
  scale(factor: number): IVector;

  isZero(tolerance?: number): boolean;
  isParallel(other: IVector, tolerance?: number): boolean;
  isOrthogonal(other: IVector, tolerance?: number): boolean;

  toArray(): number[];
}

// 方程行接口: coefficients · x = constant
export interface IEquationRow {
  readonly dimension: number;
  readonly constant: Constant;
  readonly normal: IVector;

  coefficients(): Coefficient[];
  coefficient(index: ColumnIndex): Coefficient;

  /**
   * 第一個絕對值不小於容差的係數索引，全為零時返回 null
   */
  firstNonzeroIndex(epsilon?: number): ColumnIndex | null;

  isTrivial(epsilon?: number): boolean;
  isInconsistent(epsilon?: number): boolean;
}

/**
 * 求解器選項
 */
export interface SolverOptions {
  /** 近零容差 ε，默認 1e-10 */
  readonly epsilon?: number;
}

// === 解集分類結果 ===

/**
 * 無解: 出現 0 = c (c ≠ 0) 的行
 */
export interface NoSolution {
  readonly kind: 'none';
}

/**
 * 唯一解
 */
export interface UniqueSolution {
  readonly kind: 'unique';
  readonly values: readonly number[];
}

/**
 * 無窮多解: basepoint + Σ tᵢ · directions[i]
 */
export interface ParametricSolution {
  readonly kind: 'parametric';
  readonly basepoint: readonly number[];
  /** 每個自由變量一個方向向量，與 freeVariables 一一對應 */
  readonly directions: readonly (readonly number[])[];
  /** 自由變量的列索引，升序 */
  readonly freeVariables: readonly ColumnIndex[];
}

export type SolutionResult = NoSolution | UniqueSolution | ParametricSolution;

export type SolutionKind = SolutionResult['kind'];

// === 線性系統接口 ===

/**
 * 線性系統接口
 *
 * 共享同一維度的有序方程行集合
 */
export interface ILinearSystem<Row extends IEquationRow = IEquationRow> {
  readonly dimension: number;
  readonly length: number;
  readonly epsilon: number;

  getRow(index: RowIndex): Row;
  setRow(index: RowIndex, row: Row): void;

  // 行初等變換 (就地修改)
  swapRows(i: RowIndex, j: RowIndex): void;
  scaleRow(index: RowIndex, factor: number): void;
  addScaledRow(factor: number, source: RowIndex, target: RowIndex): void;

  pivotIndices(): (ColumnIndex | null)[];

  // 消元算法 (返回獨立副本)
  computeTriangularForm(): ILinearSystem<Row>;
  computeRREF(): ILinearSystem<Row>;
  classifyAndSolve(): SolutionResult;
}

/**
 * 完整求解流程的結果，附帶兩個中間快照
 */
export interface SolveReport<System extends ILinearSystem = ILinearSystem> {
  readonly triangular: System;
  readonly rref: System;
  readonly result: SolutionResult;
}
