/**
 * Entry point for the explain command module.
 */

export { explainCommand } from './analyze';
export type { ExplainOptions, ExplainOutcome, ExplainResult } from './analyze';
export { parseExplainFlags } from './flags';
export { formatTraceHuman, formatTraceJson } from './format';
