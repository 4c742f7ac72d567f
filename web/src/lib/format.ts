import { labelOf } from "./questions";
import { DIMENSIONS, type AnalysisOutcome, type RadarSeries } from "./types";

export const formatScore = (n: number) => `${n}/100`;

/** Plain-text summary for pasting into chats. */
export function makeSummaryText(outcome: AnalysisOutcome, shareUrl?: string): string {
  const { result } = outcome;
  const lines = [
    `✨ ${result.golden_sentence} ✨`,
    ...DIMENSIONS.map((d) => `${labelOf(d)}：${formatScore(result.scores[d])}`),
    "",
    result.analysis,
  ];
  if (shareUrl) lines.push("", shareUrl);
  return lines.join("\n");
}

/** recharts closes the polygon itself, so the repeated first point is dropped. */
export function toChartData(chart: RadarSeries) {
  const points = chart.points.length > 1 ? chart.points.slice(0, -1) : chart.points;
  return points.map((p) => ({ key: p.key, category: p.category, value: p.value }));
}
