/**
 * 🎯 解集工具
 *
 * 構造、求值、比較與渲染 SolutionResult
 */

import type {
  NoSolution,
  ParametricSolution,
  SolutionResult,
  UniqueSolution,
} from '../../types/index';
import { DimensionMismatchError } from '../errors';
import { roundTo } from '../equation/equation_formatter';

export const NO_SOLUTIONS_MSG = 'No solutions';
export const INF_SOLUTIONS_MSG = 'Infinitely many solutions';
export const UNIQUE_SOLUTION_MSG = 'Unique solution';

export function noSolution(): NoSolution {
  return { kind: 'none' };
}

export function uniqueSolution(values: readonly number[]): UniqueSolution {
  return { kind: 'unique', values: [...values] };
}

export function parametricSolution(
  basepoint: readonly number[],
  directions: readonly (readonly number[])[],
  freeVariables: readonly number[]
): ParametricSolution {
  if (directions.length !== freeVariables.length) {
    throw new DimensionMismatchError(freeVariables.length, directions.length, '方向向量數與自由變量數不一致');
  }
  for (const direction of directions) {
    if (direction.length !== basepoint.length) {
      throw new DimensionMismatchError(basepoint.length, direction.length, '方向向量維度不匹配');
    }
  }
  return {
    kind: 'parametric',
    basepoint: [...basepoint],
    directions: directions.map(direction => [...direction]),
    freeVariables: [...freeVariables],
  };
}

/**
 * 解集中的一點
 *
 * 唯一解返回該點；參數解返回 basepoint + Σ parameters[i] · directions[i]；無解返回 null
 */
export function evaluateSolution(result: SolutionResult, parameters: readonly number[] = []): number[] | null {
  switch (result.kind) {
    case 'none':
      return null;

    case 'unique':
      return [...result.values];

    case 'parametric': {
      if (parameters.length !== result.directions.length) {
        throw new DimensionMismatchError(result.directions.length, parameters.length, '參數個數與自由變量數不一致');
      }
      const point = [...result.basepoint];
      result.directions.forEach((direction, i) => {
        const t = parameters[i]!;
        direction.forEach((component, j) => {
          point[j] = point[j]! + t * component;
        });
      });
      return point;
    }
  }
}

function vectorsClose(a: readonly number[], b: readonly number[], tolerance: number): boolean {
  return a.length === b.length && a.every((value, i) => Math.abs(value - b[i]!) <= tolerance);
}

/**
 * 兩個結果是否描述同一參數化 (逐元素比較，容差內相等)
 */
export function solutionsEqual(a: SolutionResult, b: SolutionResult, tolerance = 1e-9): boolean {
  if (a.kind === 'none' || b.kind === 'none') {
    return a.kind === b.kind;
  }
  if (a.kind === 'unique' || b.kind === 'unique') {
    return a.kind === 'unique' && b.kind === 'unique' && vectorsClose(a.values, b.values, tolerance);
  }
  return vectorsClose(a.freeVariables, b.freeVariables, 0)
    && vectorsClose(a.basepoint, b.basepoint, tolerance)
    && a.directions.every((direction, i) => {
      const other = b.directions[i];
      return other !== undefined && vectorsClose(direction, other, tolerance);
    });
}

function formatPoint(values: readonly number[], decimalPlaces: number): string {
  return `(${values.map(value => roundTo(value, decimalPlaces)).join(', ')})`;
}

export function formatSolution(result: SolutionResult, decimalPlaces = 3): string {
  switch (result.kind) {
    case 'none':
      return NO_SOLUTIONS_MSG;

    case 'unique':
      return `${UNIQUE_SOLUTION_MSG}: ${formatPoint(result.values, decimalPlaces)}`;

    case 'parametric': {
      const terms = result.directions.map((direction, i) =>
        `t_${result.freeVariables[i]! + 1} * ${formatPoint(direction, decimalPlaces)}`
      );
      return `${INF_SOLUTIONS_MSG}: x = ${[formatPoint(result.basepoint, decimalPlaces), ...terms].join(' + ')}`;
    }
  }
}
