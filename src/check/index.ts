/**
 * Check Module - Static Analysis for loop conditions
 * Public API for the loopcheck tool.
 */

// ============================================================
// PUBLIC TYPES
// ============================================================
export type {
  LineCheck,
  CategoryInfo,
  Severity,
  RuleState,
  Confidence,
  Diagnostic,
  ErrorSink,
  CheckConfig,
} from './types.js';

// ============================================================
// CHECK REGISTRY
// ============================================================
export {
  LINE_CHECKS,
  CATEGORIES,
  LOOP_CONDITION,
  FOR_LOOP_CONDITION,
  WHILE_LOOP_CONDITION,
  SUSPICIOUS_OPERATORS,
  checkLoopCondition,
  hasSuspiciousForCondition,
  hasSuspiciousWhileCondition,
} from './rules/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export { loadConfig, createDefaultConfig, isConfidence } from './config.js';

// ============================================================
// VALIDATION
// ============================================================
export { validateSource } from './validator.js';
