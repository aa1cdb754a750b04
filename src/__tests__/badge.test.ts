import { describe, it, expect } from "vitest";
import {
  computeBadgeLayout,
  escapeXml,
  formatBadgeLabel,
  renderBadge,
} from "../functions/badge.js";

describe("formatBadgeLabel", () => {
  it("falls back to 'no data' when there are no stats", () => {
    expect(formatBadgeLabel(null)).toBe("no data");
  });

  it("prints speed and accuracy with a middle dot", () => {
    expect(formatBadgeLabel({ bestWpm: 120, averageAccuracy: 96.1, accuracySamples: 2 })).toBe(
      "120 WPM · 96.1%",
    );
  });

  it("always prints one decimal of accuracy", () => {
    expect(formatBadgeLabel({ bestWpm: 95, averageAccuracy: 95, accuracySamples: 3 })).toBe(
      "95 WPM · 95.0%",
    );
    expect(formatBadgeLabel({ bestWpm: 0, averageAccuracy: 0, accuracySamples: 1 })).toBe(
      "0 WPM · 0.0%",
    );
  });

  it("prints a bare 0% when no run carried accuracy", () => {
    expect(formatBadgeLabel({ bestWpm: 120, averageAccuracy: 0, accuracySamples: 0 })).toBe(
      "120 WPM · 0%",
    );
  });
});

describe("computeBadgeLayout", () => {
  it("sizes the right segment to the text", () => {
    expect(computeBadgeLayout("120 WPM · 96.1%")).toEqual({
      width: 197,
      height: 20,
      leftWidth: 72,
      rightWidth: 125,
      leftCenter: 36,
      rightCenter: 134.5,
    });
  });

  it("keeps a floor of 60 for short text", () => {
    expect(computeBadgeLayout("").rightWidth).toBe(60);
    expect(computeBadgeLayout("abcde").rightWidth).toBe(60);
    expect(computeBadgeLayout("abcdef").rightWidth).toBe(62);
  });

  it("counts characters outside the basic plane once", () => {
    expect(computeBadgeLayout("\u{1F525}".repeat(6)).rightWidth).toBe(62);
  });

  it("never shrinks as the text grows", () => {
    let previous = 0;
    for (let length = 0; length <= 40; length++) {
      const { rightWidth } = computeBadgeLayout("x".repeat(length));
      expect(rightWidth).toBeGreaterThanOrEqual(previous);
      previous = rightWidth;
    }
  });
});

describe("escapeXml", () => {
  it("neutralizes markup characters", () => {
    expect(escapeXml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#x27;Jerry&#x27;&lt;/a&gt;",
    );
  });
});

describe("renderBadge", () => {
  it("renders the no data badge", () => {
    const expected = [
      '<svg xmlns="http://www.w3.org/2000/svg" width="141" height="20" viewBox="0 0 141 20" role="img" aria-label="MonkeyType: no data">',
      "  <title>MonkeyType: no data</title>",
      '  <linearGradient id="g" x2="0" y2="100%">',
      '    <stop offset="0" stop-color="#bbb" stop-opacity=".1"/>',
      '    <stop offset="1" stop-opacity=".1"/>',
      "  </linearGradient>",
      '  <rect rx="3" width="141" height="20" fill="#555"/>',
      '  <rect rx="3" x="72" width="69" height="20" fill="#2aa198"/>',
      '  <rect rx="3" width="141" height="20" fill="url(#g)"/>',
      '  <g fill="#fff" text-anchor="middle" font-family="DejaVu Sans,Verdana,Geneva,sans-serif" font-size="11">',
      '    <text x="36.0" y="14" fill="#fff">MonkeyType</text>',
      '    <text x="106.5" y="14" fill="#fff">no data</text>',
      "  </g>",
      "</svg>",
      "",
    ].join("\n");

    expect(renderBadge("no data")).toBe(expected);
  });

  it("is deterministic", () => {
    expect(renderBadge("120 WPM · 96.1%")).toBe(renderBadge("120 WPM · 96.1%"));
  });

  it("escapes the value text", () => {
    const svg = renderBadge("<b>&");

    expect(svg).toContain('<text x="102.0" y="14" fill="#fff">&lt;b&gt;&amp;</text>');
    expect(svg).toContain("<title>MonkeyType: &lt;b&gt;&amp;</title>");
    expect(svg).toContain('aria-label="MonkeyType: &lt;b&gt;&amp;"');
  });
});
