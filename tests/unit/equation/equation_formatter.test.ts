/**
 * 🧪 方程格式化測試
 */

import { describe, it, expect } from 'vitest';
import {
  formatEquation,
  formatRow,
  formatSystem,
  roundTo,
} from '../../../src/core/equation/equation_formatter';
import { EquationRow } from '../../../src/core/equation/equation_row';

describe('formatEquation', () => {
  it('首項不帶符號空格，後續項帶 + / -', () => {
    expect(formatEquation([1, 2, -3], 4)).toBe('x_1 + 2x_2 - 3x_3 = 4');
  });

  it('負的首項與 ±1 係數', () => {
    expect(formatEquation([-1, 0, 1], -2)).toBe('-x_1 + x_3 = -2');
    expect(formatEquation([-2.5, -1], -0.0001)).toBe('-2.5x_1 - x_2 = 0');
  });

  it('全零係數渲染為 0', () => {
    expect(formatEquation([0, 0, 0], 5)).toBe('0 = 5');
  });

  it('保留三位小數並省略捨入後為零的項', () => {
    expect(formatEquation([0.12345, 2.5], 1.0004)).toBe('0.123x_1 + 2.5x_2 = 1');
    expect(formatEquation([1e-5, 3], 0)).toBe('3x_2 = 0');
  });

  it('自定義小數位數', () => {
    expect(formatEquation([1.23456], 2, 1)).toBe('1.2x_1 = 2');
  });
});

describe('roundTo', () => {
  it('四捨五入並去掉 -0', () => {
    expect(roundTo(2.34567, 2)).toBe(2.35);
    expect(Object.is(roundTo(-0.0001), 0)).toBe(true);
  });
});

describe('formatRow / formatSystem', () => {
  it('formatRow 渲染單行', () => {
    expect(formatRow(EquationRow.of([0, 1], 2))).toBe('x_2 = 2');
  });

  it('formatSystem 為每行編號', () => {
    const rows = [EquationRow.of([1, 1], 1), EquationRow.of([0, 1], 2)];

    expect(formatSystem(rows)).toBe(
      'Linear System:\nEquation 1: x_1 + x_2 = 1\nEquation 2: x_2 = 2'
    );
    expect(formatSystem(rows, 'RREF').split('\n')[0]).toBe('RREF:');
  });
});
