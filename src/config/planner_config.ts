/**
 * @fileoverview Planner configuration
 *
 * Configuration is validated with Zod at construction time. Anything out of
 * range (weight overrides outside [0.1, 2.0], negative budgets, priority
 * multipliers that shrink as priority rises) becomes a ConfigurationError.
 *
 * Sources, later ones winning:
 * - built-in defaults
 * - a YAML file (`loadPlannerConfigFile`)
 * - `GRAPH_PLANNER_*` environment variables (`loadPlannerConfigFromEnv`)
 * - explicit overrides passed to `resolvePlannerConfig`
 */

import * as fs from 'fs/promises';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import type { Budget } from '../types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const MIN_EDGE_WEIGHT = 0.1;
export const MAX_EDGE_WEIGHT = 2.0;

export const DEFAULT_EDGE_TYPES: readonly string[] = [
  'subclass_of',
  'instance_of',
  'part_of',
  'related_to',
  'mentions',
  'category_contains',
  'similar_to',
];

export const DEFAULT_BUDGET: Readonly<Budget> = {
  vectorSearchMs: 500,
  graphTraversalMs: 1000,
  rankingMs: 200,
  timeoutMs: 2000,
  maxNodes: 1000,
  maxEdges: 5000,
  categoryTraversalMs: 5000,
  maxCategories: 20,
  topicExpansionMs: 3000,
  maxTopics: 15,
};

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

const EdgeWeightSchema = z.number().min(MIN_EDGE_WEIGHT).max(MAX_EDGE_WEIGHT);

const BudgetOverrideSchema = z.object({
  vectorSearchMs: z.number().nonnegative(),
  graphTraversalMs: z.number().nonnegative(),
  rankingMs: z.number().nonnegative(),
  timeoutMs: z.number().nonnegative(),
  maxNodes: z.number().int().nonnegative(),
  maxEdges: z.number().int().nonnegative(),
  categoryTraversalMs: z.number().nonnegative(),
  maxCategories: z.number().int().nonnegative(),
  topicExpansionMs: z.number().nonnegative(),
  maxTopics: z.number().int().nonnegative(),
}).partial().strict();

const PriorityMultipliersSchema = z.object({
  low: z.number().positive().default(0.5),
  normal: z.number().positive().default(1.0),
  high: z.number().positive().default(1.5),
}).strict().refine(
  (m) => m.low <= m.normal && m.normal <= m.high,
  { message: 'priority multipliers must not decrease from low to normal to high' }
);

export const PlannerConfigSchema = z.object({
  vectorWeight: z.number().min(0).max(1).default(0.7),
  graphWeight: z.number().min(0).max(1).default(0.3),
  hierarchicalBonus: z.number().min(0).max(1).default(0.2),
  hierarchicalWeight: z.number().min(0).default(1.5),
  defaultEdgeWeight: EdgeWeightSchema.default(0.5),
  edgeWeightOverrides: z.record(z.string().min(1), EdgeWeightSchema).default({}),
  similarityThreshold: z.number().min(0).max(1).default(0.65),
  maxExpansions: z.number().int().min(1).default(5),
  learningRate: z.number().min(0).max(1).default(0.05),
  defaultEdgeTypes: z.array(z.string().min(1)).default([...DEFAULT_EDGE_TYPES]),
  budgetDefaults: BudgetOverrideSchema.default({}),
  priorityMultipliers: PriorityMultipliersSchema.default({}),
}).strict();

export type PlannerConfigInput = z.input<typeof PlannerConfigSchema>;
export type PlannerConfig = z.output<typeof PlannerConfigSchema>;

// ============================================================================
// RESOLUTION
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a partial configuration and fill in defaults.
 * @throws ConfigurationError listing every invalid field
 */
export function resolvePlannerConfig(input: unknown = {}, source?: string): PlannerConfig {
  const parsed = PlannerConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error), source);
  }
  return parsed.data;
}

/**
 * Merge the configured budget overrides onto the built-in defaults.
 */
export function resolveBudgetDefaults(config: PlannerConfig): Budget {
  return { ...DEFAULT_BUDGET, ...config.budgetDefaults };
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

const ENV_KEYS = {
  GRAPH_PLANNER_VECTOR_WEIGHT: 'vectorWeight',
  GRAPH_PLANNER_GRAPH_WEIGHT: 'graphWeight',
  GRAPH_PLANNER_SIMILARITY_THRESHOLD: 'similarityThreshold',
  GRAPH_PLANNER_MAX_EXPANSIONS: 'maxExpansions',
  GRAPH_PLANNER_DEFAULT_EDGE_WEIGHT: 'defaultEdgeWeight',
} as const satisfies Record<string, keyof PlannerConfig>;

const EnvNumberSchema = z.coerce.number().finite();

/**
 * Read numeric settings from `GRAPH_PLANNER_*` variables on top of `base`.
 * Unset or blank variables are ignored; unparsable ones are configuration errors.
 */
export function loadPlannerConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  base: PlannerConfigInput = {}
): PlannerConfig {
  const overrides: Record<string, number> = {};
  const issues: string[] = [];

  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === '') continue;
    const parsed = EnvNumberSchema.safeParse(raw);
    if (!parsed.success) {
      issues.push(`${envKey}: expected a number, got "${raw}"`);
      continue;
    }
    overrides[configKey] = parsed.data;
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues, 'environment');
  }
  return resolvePlannerConfig({ ...base, ...overrides }, 'environment');
}

// ============================================================================
// FILE
// ============================================================================

/**
 * Load a YAML configuration file.
 * @throws ConfigurationError when the file is unreadable, not YAML, or invalid
 */
export async function loadPlannerConfigFile(filePath: string): Promise<PlannerConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigurationError([`cannot read file: ${getErrorMessage(error)}`], filePath);
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch (error: unknown) {
    throw new ConfigurationError([`malformed YAML: ${getErrorMessage(error)}`], filePath);
  }

  return resolvePlannerConfig(parsed ?? {}, filePath);
}
