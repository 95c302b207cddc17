// Solver logging module - kept free of solver imports to avoid circular dependencies

export type Verbosity = 'silent' | 'normal' | 'verbose';

// Oldest entries are dropped once the history is full
export const MAX_LOG_HISTORY = 500;

const logHistory: string[] = [];

// 'normal' shows outcomes and warnings, 'verbose' adds every pivot and elimination step
let verbosity: Verbosity = 'normal';

const isTest = typeof process !== 'undefined' && process.env.NODE_ENV === 'test';

// Allow console output during tests via environment variable
const FORCE_CONSOLE_LOGS = typeof process !== 'undefined' && process.env.ECHELON_VERBOSE_TESTS === 'true';

let onLogCallback: ((message: string) => void) | null = null;

export function setLogCallback(callback: ((message: string) => void) | null): void {
  onLogCallback = callback;
}

/**
 * Set verbosity level for solver logging.
 * - 'silent': nothing is recorded
 * - 'normal': classification outcomes and warnings
 * - 'verbose': also every row swap, scale and elimination
 */
export function setVerbosity(level: Verbosity): void {
  verbosity = level;
}

export function getVerbosity(): Verbosity {
  return verbosity;
}

function emit(message: string, sink: (message: string) => void): void {
  if (verbosity === 'silent') {
    return;
  }

  if (!isTest || FORCE_CONSOLE_LOGS) {
    sink(message);
  }

  logHistory.push(message);
  if (logHistory.length > MAX_LOG_HISTORY) {
    logHistory.splice(0, logHistory.length - MAX_LOG_HISTORY);
  }
  onLogCallback?.(message);
}

/**
 * Main log function - records to history and console (respecting test mode).
 */
export function log(message: string): void {
  emit(message, console.log);
}

/**
 * Debug log function - only logs when verbosity is 'verbose'.
 */
export function logDebug(message: string): void {
  if (verbosity !== 'verbose') {
    return;
  }
  log(message);
}

export function logWarn(message: string): void {
  emit(`⚠️ ${message}`, console.warn);
}

export function getLogHistory(): readonly string[] {
  return logHistory;
}

export function clearLogHistory(): void {
  logHistory.length = 0;
}
