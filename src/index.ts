export {
  buildScoreboardUrl,
  extractRunSamples,
  fetchScoreboard,
  fetchStats,
  summarizeRuns,
  type FetchFn,
  type ScoreboardRequestOptions,
} from "./functions/monkeytype.js";
export {
  computeBadgeLayout,
  escapeXml,
  formatBadgeLabel,
  renderBadge,
  type BadgeLayout,
} from "./functions/badge.js";
export { writeBadge } from "./functions/output.js";
export { generateBadge, type GeneratedBadge } from "./functions/generate.js";
export {
  parseCliArgs,
  runBadgeCommand,
  type CliArgs,
  type CommandOutput,
} from "./functions/cli.js";
export * from "./errors/index.js";
export * from "./types/stats.js";
