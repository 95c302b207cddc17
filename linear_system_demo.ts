/**
 * 🧮 線性方程組求解演示 - Echelon 1.0
 *
 * 構造幾個典型方程組，打印行階梯形、簡化行階梯形與解集分類
 *
 * 📊 方程組：
 *   - 三個平面交於一點
 *   - 兩個重合平面 (無窮多解)
 *   - 含 0 = 5 的矛盾方程組 (無解)
 *   - 兩條二維直線的交點
 */

import { EquationRow } from './src/core/equation/equation_row';
import { intersectLines } from './src/core/equation/intersection';
import { LinearSystem } from './src/core/system/linear_system';
import { formatSolution } from './src/core/system/solution';
import { setVerbosity } from './src/utils/logger';

interface DemoCase {
  title: string;
  augmented: number[][];
}

const DEMO_CASES: DemoCase[] = [
  {
    title: '三平面交於一點',
    augmented: [
      [0, 1, 1, 1],
      [1, -1, 1, 2],
      [1, 2, -5, 3],
    ],
  },
  {
    title: '兩個重合平面',
    augmented: [
      [5.862, 1.178, -10.366, -8.15],
      [-2.931, -0.589, 5.183, 4.075],
    ],
  },
  {
    title: '矛盾方程組',
    augmented: [
      [1, 1, 1, 1],
      [0, 1, 0, 2],
      [0, 0, 0, 5],
    ],
  },
];

function runDemoCase({ title, augmented }: DemoCase): void {
  console.log(`\n📐 ${title}`);
  const system = LinearSystem.fromAugmented(augmented);
  console.log(system.toString());

  const report = system.solve();
  console.log(`\n${report.triangular.toString().replace('Linear System', '行階梯形')}`);
  console.log(`\n${report.rref.toString().replace('Linear System', '簡化行階梯形')}`);
  console.log(`\n🎯 ${formatSolution(report.result)}`);
}

function runLineIntersectionDemo(): void {
  console.log('\n✖️ 二維直線交點');
  const first = EquationRow.of([4.046, 2.836], 1.21);
  const second = EquationRow.of([10.115, 7.09], 3.025);
  console.log(`   ${first.toString()}`);
  console.log(`   ${second.toString()}`);

  const intersection = intersectLines(first, second);
  const description = intersection.kind === 'point'
    ? `交於 (${intersection.point.join(', ')})`
    : intersection.kind === 'coincident' ? '兩直線重合' : '兩直線平行';
  console.log(`   → ${description}`);
}

function runLinearSystemDemo(): void {
  console.log('🚀 ===== 線性方程組求解演示 =====');
  setVerbosity('normal');

  try {
    DEMO_CASES.forEach(runDemoCase);
    runLineIntersectionDemo();
  } catch (error) {
    console.error('❌ 演示過程中發生錯誤:', error);
    process.exitCode = 1;
  } finally {
    console.log('\n🏁 ===== 演示結束 =====');
  }
}

runLinearSystemDemo();
