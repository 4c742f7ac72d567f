import { DIMENSIONS, DIMENSION_LABELS, type RadarPoint, type RadarSeries, type Scores } from "./types";

export const RADAR_DOMAIN = [0, 100] as const;

/** Closed polygon: the four dimensions in fixed order, then the first one again. */
export function buildRadarSeries(scores: Scores, displayName: string): RadarSeries {
  const points: RadarPoint[] = DIMENSIONS.map((key) => ({
    key,
    category: DIMENSION_LABELS[key],
    value: scores[key],
  }));
  return {
    title: `${displayName} 的 AI 潜力雷达图`,
    domain: RADAR_DOMAIN,
    points: [...points, { ...points[0] }],
  };
}
