/**
 * @fileoverview Planner configuration entry point
 */

export {
  DEFAULT_BUDGET,
  DEFAULT_EDGE_TYPES,
  MAX_EDGE_WEIGHT,
  MIN_EDGE_WEIGHT,
  PlannerConfigSchema,
  loadPlannerConfigFile,
  loadPlannerConfigFromEnv,
  resolveBudgetDefaults,
  resolvePlannerConfig,
  type PlannerConfig,
  type PlannerConfigInput,
} from './planner_config.js';
