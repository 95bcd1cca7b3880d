/**
 * Centralized Vitest setup for ruleweaver.
 *
 * Keeps test output readable by silencing the stderr logger unless a test
 * run asks for it, and clears provider settings inherited from the shell so
 * configuration tests start from the documented defaults.
 */

import { afterEach, vi } from 'vitest';

if (!process.env.RULEWEAVER_TEST_LOG_LEVEL) {
  process.env.RULEWEAVER_LOG_LEVEL = 'silent';
} else {
  process.env.RULEWEAVER_LOG_LEVEL = process.env.RULEWEAVER_TEST_LOG_LEVEL;
}

for (const key of [
  'RULEWEAVER_LLM_PROVIDER',
  'RULEWEAVER_LLM_MODEL',
  'RULEWEAVER_LLM_TIMEOUT_MS',
  'RULEWEAVER_KNOWLEDGE_DIR',
  'RULEWEAVER_RULES_PATH',
  'RULEWEAVER_REFRESH_INTERVAL_MS',
]) {
  delete process.env[key];
}

afterEach(() => {
  vi.useRealTimers();
});
