/**
 * Check Registry
 * Barrel export for all line checks.
 */

import type { CategoryInfo, LineCheck } from '../types.js';
import { LOOP_CONDITION } from './loops.js';

// ============================================================
// RE-EXPORT INDIVIDUAL CHECKS
// ============================================================

export {
  LOOP_CONDITION,
  FOR_LOOP_CONDITION,
  WHILE_LOOP_CONDITION,
  SUSPICIOUS_OPERATORS,
  checkLoopCondition,
  hasSuspiciousForCondition,
  hasSuspiciousWhileCondition,
} from './loops.js';

// ============================================================
// CHECK REGISTRY
// ============================================================

/**
 * All registered line checks.
 * Each runs once per line during validation.
 */
export const LINE_CHECKS: LineCheck[] = [
  // Runtime correctness
  LOOP_CONDITION,
];

/**
 * Every category any registered check can report.
 */
export const CATEGORIES: CategoryInfo[] = LINE_CHECKS.flatMap((check) => [
  ...check.categories,
]);
