import { DEFAULT_OUTPUT_PATH } from "../constants.js";
import { formatBadgeLabel, renderBadge } from "./badge.js";
import { fetchStats, type ScoreboardRequestOptions } from "./monkeytype.js";
import { writeBadge } from "./output.js";

type GenerateBadgeInput = ScoreboardRequestOptions & {
  username: string;
  outputPath?: string;
};

export type GeneratedBadge = {
  outputPath: string;
  label: string;
  svg: string;
};

export async function generateBadge({
  username,
  outputPath = DEFAULT_OUTPUT_PATH,
  ...requestOptions
}: GenerateBadgeInput): Promise<GeneratedBadge> {
  const stats = await fetchStats(username, requestOptions);
  const label = formatBadgeLabel(stats);
  const svg = renderBadge(label);
  await writeBadge(outputPath, svg);
  return { outputPath, label, svg };
}
