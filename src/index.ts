/**
 * 🎯 Echelon 公共接口
 */

export type * from './types/index';

export { Vector } from './math/dense/vector';
export { DEFAULT_EPSILON, NumericalSafety } from './math/numerical/safety';

export {
  LinearSystemError,
  DimensionMismatchError,
  EmptyCoefficientsError,
  DegenerateScaleError,
  RowIndexError,
  IndexError,
  InvalidNumberError,
  isLinearSystemError,
} from './core/errors';
export type { LinearSystemErrorCode } from './core/errors';

export { EquationRow } from './core/equation/equation_row';
export {
  DEFAULT_DECIMAL_PLACES,
  formatEquation,
  formatRow,
  formatSystem,
  roundTo,
} from './core/equation/equation_formatter';
export { intersectLines } from './core/equation/intersection';
export type { LineIntersection } from './core/equation/intersection';

export { LinearSystem } from './core/system/linear_system';
export {
  NO_SOLUTIONS_MSG,
  INF_SOLUTIONS_MSG,
  UNIQUE_SOLUTION_MSG,
  noSolution,
  uniqueSolution,
  parametricSolution,
  evaluateSolution,
  solutionsEqual,
  formatSolution,
} from './core/system/solution';

export {
  log,
  logDebug,
  logWarn,
  setVerbosity,
  getVerbosity,
  setLogCallback,
  getLogHistory,
  clearLogHistory,
  MAX_LOG_HISTORY,
} from './utils/logger';
export type { Verbosity } from './utils/logger';
