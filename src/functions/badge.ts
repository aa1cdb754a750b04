import {
  BADGE_CHAR_WIDTH,
  BADGE_HEIGHT,
  BADGE_LABEL,
  BADGE_LEFT_WIDTH,
  BADGE_RIGHT_MIN_WIDTH,
  BADGE_RIGHT_PADDING,
  NO_DATA_LABEL,
} from "../constants.js";
import { type StatsSummary } from "../types/stats.js";

export interface BadgeLayout {
  width: number;
  height: number;
  leftWidth: number;
  rightWidth: number;
  leftCenter: number;
  rightCenter: number;
}

export const escapeXml = (s: string) =>
  s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");

// Centres are halves of widths and always carry a decimal ("36.0", "106.5")
const formatCoordinate = (n: number) =>
  Number.isInteger(n) ? n.toFixed(1) : String(n);

export function formatBadgeLabel(stats: StatsSummary | null): string {
  if (!stats) return NO_DATA_LABEL;
  // Without accuracy samples the average is a bare 0, not a measured 0.0
  const accuracy =
    stats.accuracySamples > 0 ? stats.averageAccuracy.toFixed(1) : "0";
  return `${stats.bestWpm} WPM · ${accuracy}%`;
}

export function computeBadgeLayout(text: string): BadgeLayout {
  const leftWidth = BADGE_LEFT_WIDTH;
  const rightWidth = Math.max(
    BADGE_RIGHT_MIN_WIDTH,
    BADGE_CHAR_WIDTH * [...text].length + BADGE_RIGHT_PADDING,
  );
  return {
    width: leftWidth + rightWidth,
    height: BADGE_HEIGHT,
    leftWidth,
    rightWidth,
    leftCenter: leftWidth / 2,
    rightCenter: leftWidth + rightWidth / 2,
  };
}

export function renderBadge(text: string): string {
  const { width, height, leftWidth, rightWidth, leftCenter, rightCenter } =
    computeBadgeLayout(text);
  const label = escapeXml(BADGE_LABEL);
  const value = escapeXml(text);
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" role="img" aria-label="${label}: ${value}">
  <title>${label}: ${value}</title>
  <linearGradient id="g" x2="0" y2="100%">
    <stop offset="0" stop-color="#bbb" stop-opacity=".1"/>
    <stop offset="1" stop-opacity=".1"/>
  </linearGradient>
  <rect rx="3" width="${width}" height="${height}" fill="#555"/>
  <rect rx="3" x="${leftWidth}" width="${rightWidth}" height="${height}" fill="#2aa198"/>
  <rect rx="3" width="${width}" height="${height}" fill="url(#g)"/>
  <g fill="#fff" text-anchor="middle" font-family="DejaVu Sans,Verdana,Geneva,sans-serif" font-size="11">
    <text x="${formatCoordinate(leftCenter)}" y="14" fill="#fff">${label}</text>
    <text x="${formatCoordinate(rightCenter)}" y="14" fill="#fff">${value}</text>
  </g>
</svg>
`;
}
