// ============================================================================
// @numerals/cli — Public API
// ============================================================================

export { runCli, USAGE, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './commands.js';
export type { CliIO } from './commands.js';
export { runSelfTest, SELF_TEST_CASES } from './selftest.js';
export type { SelfTestCase, SelfTestResult } from './selftest.js';
