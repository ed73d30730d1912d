/**
 * Centralized Vitest setup
 *
 * Test log level defaults to 'warn' so tests can observe planner warnings
 * (debug/info output stays quiet). Set GRAPH_PLANNER_TEST_LOG_LEVEL to override.
 */

import { beforeEach } from 'vitest';
import { setLogLevel, type LogLevel } from './src/telemetry/logger.js';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const requested = process.env.GRAPH_PLANNER_TEST_LOG_LEVEL;
const testLogLevel: LogLevel = LEVELS.find((level) => level === requested) ?? 'warn';

beforeEach(() => {
  setLogLevel(testLogLevel);
});
