/**
 * 🖨️ 方程格式化
 *
 * 把一行渲染為 `x_1 + 2x_2 - 3x_3 = 4`
 */

import type { IEquationRow } from '../../types/index';

export const DEFAULT_DECIMAL_PLACES = 3;

/**
 * 按小數位四捨五入，並去掉 -0
 */
export function roundTo(value: number, decimalPlaces: number = DEFAULT_DECIMAL_PLACES): number {
  const factor = 10 ** decimalPlaces;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

function formatTerm(coefficient: number, index: number, isInitialTerm: boolean): string {
  let output = '';

  if (coefficient < 0) {
    output += '-';
  }
  if (coefficient > 0 && !isInitialTerm) {
    output += '+';
  }
  if (!isInitialTerm) {
    output += ' ';
  }
  if (Math.abs(coefficient) !== 1) {
    output += `${Math.abs(coefficient)}`;
  }

  return `${output}x_${index + 1}`;
}

/**
 * 渲染係數與常數。捨入後為零的項省略，係數 ±1 不寫數字，全零時左側為 0
 */
export function formatEquation(
  coefficients: readonly number[],
  constant: number,
  decimalPlaces: number = DEFAULT_DECIMAL_PLACES
): string {
  const terms: string[] = [];

  coefficients.forEach((raw, index) => {
    const coefficient = roundTo(raw, decimalPlaces);
    if (coefficient === 0) return;
    terms.push(formatTerm(coefficient, index, terms.length === 0));
  });

  const lhs = terms.length > 0 ? terms.join(' ') : '0';
  return `${lhs} = ${roundTo(constant, decimalPlaces)}`;
}

export function formatRow(row: IEquationRow, decimalPlaces?: number): string {
  return formatEquation(row.coefficients(), row.constant, decimalPlaces);
}

/**
 * 多行渲染，每行前綴 `Equation n:`
 */
export function formatSystem(rows: readonly IEquationRow[], title = 'Linear System'): string {
  const lines = rows.map((row, i) => `Equation ${i + 1}: ${formatRow(row)}`);
  return [`${title}:`, ...lines].join('\n');
}
