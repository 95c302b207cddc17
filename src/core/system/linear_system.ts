/**
 * 🧮 線性方程組 - Echelon 1.0
 *
 * 共享同一維度的有序方程行集合
 *
 * 流程：
 * 1. computeTriangularForm - 行階梯形 (REF)
 * 2. computeRREF           - 簡化行階梯形 (主元為 1，且是所在列唯一非零元)
 * 3. classifyAndSolve      - 無解 / 唯一解 / 參數解
 *
 * 行變換 (swapRows, scaleRow, addScaledRow, setRow) 就地修改；
 * 兩個消元算法總是在深拷貝上進行，不會改動調用者的系統
 *
 * 主元選擇：取下方第一個可用行，而非絕對值最大的行。
 * 對良態的小系統足夠，病態輸入下不保證數值穩定
 */

import numeric from 'numeric';
import type {
  ILinearSystem,
  ParametricSolution,
  SolutionResult,
  SolveReport,
  SolverOptions,
} from '../../types/index';
import { DEFAULT_EPSILON, NumericalSafety } from '../../math/numerical/safety';
import { log, logDebug, logWarn } from '../../utils/logger';
import { EquationRow } from '../equation/equation_row';
import { formatSystem } from '../equation/equation_formatter';
import {
  DimensionMismatchError,
  EmptyCoefficientsError,
  InvalidNumberError,
  RowIndexError,
} from '../errors';
import { noSolution, parametricSolution, uniqueSolution } from './solution';

// 高於 ε 但小於此值的主元會放大舍入誤差
const SMALL_PIVOT_WARNING = 1e-6;

interface PivotRow {
  readonly row: EquationRow;
  readonly column: number;
}

export class LinearSystem implements ILinearSystem<EquationRow> {
  private _rows: EquationRow[];
  readonly dimension: number;
  readonly epsilon: number;

  constructor(rows: readonly EquationRow[], options: SolverOptions = {}) {
    const first = rows[0];
    if (first === undefined) {
      throw new EmptyCoefficientsError('方程行列表');
    }

    const epsilon = options.epsilon ?? DEFAULT_EPSILON;
    if (!NumericalSafety.isValidNumber(epsilon) || epsilon <= 0) {
      throw new InvalidNumberError(epsilon, '近零容差');
    }

    for (const row of rows) {
      if (row.dimension !== first.dimension) {
        throw new DimensionMismatchError(first.dimension, row.dimension, '所有方程行必須處於同一維度');
      }
    }

    this._rows = [...rows];
    this.dimension = first.dimension;
    this.epsilon = epsilon;
  }

  /**
   * 從增廣矩陣創建: 每行最後一個元素是常數項
   */
  static fromAugmented(matrix: readonly (readonly number[])[], options: SolverOptions = {}): LinearSystem {
    const rows = matrix.map(entries => {
      if (entries.length < 2) {
        throw new EmptyCoefficientsError('增廣矩陣的係數部分');
      }
      return new EquationRow(entries.slice(0, -1), entries[entries.length - 1]);
    });
    return new LinearSystem(rows, options);
  }

  get length(): number {
    return this._rows.length;
  }

  /**
   * 行快照
   */
  get rows(): readonly EquationRow[] {
    return [...this._rows];
  }

  getRow(index: number): EquationRow {
    this._validateRowIndex(index);
    return this._rows[index]!;
  }

  /**
   * 替換一行，維度必須與系統一致
   */
  setRow(index: number, row: EquationRow): void {
    this._validateRowIndex(index);
    if (row.dimension !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, row.dimension, '所有方程行必須處於同一維度');
    }
    this._rows[index] = row;
  }

  // === 行初等變換 ===

  swapRows(i: number, j: number): void {
    const first = this.getRow(i);
    const second = this.getRow(j);
    this._rows[i] = second;
    this._rows[j] = first;
  }

  /**
   * 第 index 行乘以 factor。factor 為 0 會抹掉整行信息，由調用者避免
   */
  scaleRow(index: number, factor: number): void {
    this._rows[index] = this.getRow(index).scale(factor);
  }

  /**
   * target ← target + factor · source，source 不變
   */
  addScaledRow(factor: number, source: number, target: number): void {
    const sourceRow = this.getRow(source);
    this._rows[target] = this.getRow(target).plus(sourceRow, factor);
  }

  /**
   * 每行的主元列，全零行為 null
   */
  pivotIndices(): (number | null)[] {
    return this._rows.map(row => row.firstNonzeroIndex(this.epsilon));
  }

  clone(): LinearSystem {
    return new LinearSystem(this._rows, { epsilon: this.epsilon });
  }

  // === 消元算法 ===

  /**
   * 行階梯形：每行主元列嚴格遞增，主元不要求為 1
   */
  computeTriangularForm(): LinearSystem {
    const system = this.clone();

    for (let row = 0; row < system.length; row++) {
      for (let col = 0; col < system.dimension; col++) {
        const coefficient = system.getRow(row).coefficient(col);
        if (NumericalSafety.isNearZero(coefficient, system.epsilon)) {
          // 本列無主元時嘗試下一列，行不前進
          if (!system._swapWithRowBelow(row, col)) continue;
        }
        system._clearCoefficientsBelow(row, col);
        break;
      }
    }

    return system;
  }

  /**
   * 簡化行階梯形：從最後一行向上，主元歸一並消去上方同列元素
   */
  computeRREF(): LinearSystem {
    return this.computeTriangularForm()._reduceFromTriangular();
  }

  /**
   * 對簡化行階梯形分類
   */
  classifyAndSolve(): SolutionResult {
    return this._classify(this.computeRREF());
  }

  /**
   * 完整求解，附帶 REF 與 RREF 快照。每個階段只計算一次
   */
  solve(): SolveReport<LinearSystem> {
    const triangular = this.computeTriangularForm();
    const rref = triangular.clone()._reduceFromTriangular();
    return { triangular, rref, result: this._classify(rref) };
  }

  // === 驗證 ===

  coefficientMatrix(): number[][] {
    return this._rows.map(row => row.coefficients());
  }

  constants(): number[] {
    return this._rows.map(row => row.constant);
  }

  /**
   * 殘差 ‖A·x − b‖₂
   */
  residualNorm(point: readonly number[]): number {
    if (point.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, point.length, '解向量維度不匹配');
    }

    const product = numeric.dotMV(this.coefficientMatrix(), [...point]);
    const constants = this.constants();
    const residual = product.map((value, i) => value - constants[i]!);
    return numeric.norm2(residual);
  }

  isSatisfiedBy(point: readonly number[], tolerance = 1e-6): boolean {
    return this.residualNorm(point) < tolerance;
  }

  /**
   * 逐行逐元素相等
   */
  equals(other: LinearSystem, tolerance: number = this.epsilon): boolean {
    return other.dimension === this.dimension
      && other.length === this.length
      && this._rows.every((row, i) => row.equals(other.getRow(i), tolerance));
  }

  toString(): string {
    return formatSystem(this._rows);
  }

  // 私有方法

  /**
   * 就地把行階梯形化為簡化行階梯形: 從最後一行向上，主元歸一並消去上方同列元素
   */
  private _reduceFromTriangular(): LinearSystem {
    for (let row = this.length - 1; row >= 0; row--) {
      const col = this.getRow(row).firstNonzeroIndex(this.epsilon);
      if (col === null) continue;

      this._normalizePivot(row, col);
      this._clearCoefficientsAbove(row, col);
    }
    return this;
  }

  /**
   * 對簡化行階梯形分類
   */
  private _classify(rref: LinearSystem): SolutionResult {
    const epsilon = rref.epsilon;

    if (rref._rows.some(row => row.isInconsistent(epsilon))) {
      log(`🚫 方程組無解 (${this.length} 行, ${this.dimension} 維)`);
      return noSolution();
    }

    // 0 = 0 行不攜帶信息
    const pivotRows: PivotRow[] = [];
    for (const row of rref._rows) {
      const column = row.firstNonzeroIndex(epsilon);
      if (column !== null) {
        pivotRows.push({ row, column });
      }
    }

    const pivotColumns = new Set(pivotRows.map(entry => entry.column));
    const freeVariables: number[] = [];
    for (let col = 0; col < this.dimension; col++) {
      if (!pivotColumns.has(col)) freeVariables.push(col);
    }

    if (freeVariables.length > 0) {
      const solution = this._parametrize(pivotRows, freeVariables);
      log(`♾️ 方程組有無窮多解: ${freeVariables.length} 個自由變量`);
      return solution;
    }

    const values = new Array<number>(this.dimension).fill(0);
    for (const { row, column } of pivotRows) {
      values[column] = NumericalSafety.snapToZero(row.constant, epsilon);
    }

    log(`✅ 方程組有唯一解 (${this.dimension} 維)`);
    return uniqueSolution(values);
  }

  /**
   * 與下方第一個在 col 列非近零的行交換，返回是否成功
   */
  private _swapWithRowBelow(row: number, col: number): boolean {
    for (let below = row + 1; below < this.length; below++) {
      const coefficient = this.getRow(below).coefficient(col);
      if (!NumericalSafety.isNearZero(coefficient, this.epsilon)) {
        logDebug(`🔄 交換第 ${row} 行與第 ${below} 行 (列 ${col})`);
        this.swapRows(row, below);
        return true;
      }
    }
    return false;
  }

  private _clearCoefficientsBelow(row: number, col: number): void {
    const pivot = this.getRow(row).coefficient(col);
    if (Math.abs(pivot) < SMALL_PIVOT_WARNING) {
      logWarn(`主元過小，結果可能不穩定: (${row}, ${col}) = ${pivot}`);
    }

    for (let below = row + 1; below < this.length; below++) {
      const alpha = -NumericalSafety.guardedDivide(
        this.getRow(below).coefficient(col), pivot, this.epsilon, '消元主元'
      );
      this.addScaledRow(alpha, row, below);
    }
    logDebug(`➖ 以 (${row}, ${col}) 為主元消去下方 ${this.length - row - 1} 行`);
  }

  private _clearCoefficientsAbove(row: number, col: number): void {
    for (let above = row - 1; above >= 0; above--) {
      const alpha = -this.getRow(above).coefficient(col);
      this.addScaledRow(alpha, row, above);
    }
  }

  /**
   * 除以主元值使主元恰為 1
   */
  private _normalizePivot(row: number, col: number): void {
    const current = this.getRow(row);
    this._rows[row] = current.divide(current.coefficient(col), this.epsilon);
    logDebug(`➗ 第 ${row} 行主元 (列 ${col}) 歸一`);
  }

  private _parametrize(pivotRows: readonly PivotRow[], freeVariables: readonly number[]): ParametricSolution {
    const epsilon = this.epsilon;

    const basepoint = new Array<number>(this.dimension).fill(0);
    for (const { row, column } of pivotRows) {
      basepoint[column] = NumericalSafety.snapToZero(row.constant, epsilon);
    }

    const directions = freeVariables.map(free => {
      const direction = new Array<number>(this.dimension).fill(0);
      direction[free] = 1;
      for (const { row, column } of pivotRows) {
        direction[column] = NumericalSafety.snapToZero(0 - row.coefficient(free), epsilon);
      }
      return direction;
    });

    return parametricSolution(basepoint, directions, freeVariables);
  }

  private _validateRowIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._rows.length) {
      throw new RowIndexError(index, this._rows.length);
    }
  }
}
