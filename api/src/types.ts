/** The four scored dimensions, in chart order. */
export const DIMENSIONS = ["innovation", "collaboration", "leadership", "tech_acumen"] as const;

export type Dimension = (typeof DIMENSIONS)[number];

/** Display labels used for the radar chart and the score list. */
export const DIMENSION_LABELS: Record<Dimension, string> = {
  innovation: "创新指数",
  collaboration: "协作潜力",
  leadership: "领导特质",
  tech_acumen: "技术敏感度",
};

export type ProfileInputs = Readonly<Record<Dimension, string>>;

export type Scores = Record<Dimension, number>;

export interface AnalysisResult {
  scores: Scores;
  analysis: string;
  golden_sentence: string;
}

/** Raw form body. Everything is optional until validated. */
export interface Submission {
  nickname: string;
  innovation: string;
  collaboration: string;
  leadership: string;
  tech_acumen: string;
}

export interface ShareRecord {
  timestamp: string;
  share_id: string;
  nickname: string;
  inputs: ProfileInputs;
  result: AnalysisResult;
}

export interface RadarPoint {
  key: Dimension;
  category: string;
  value: number;
}

export interface RadarSeries {
  title: string;
  domain: readonly [number, number];
  points: RadarPoint[];
}
