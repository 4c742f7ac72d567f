import { normalizeAnalysis, resolveScores } from "../parser";
import type { AnalysisResult, ShareRecord } from "../types";

/** Column order on the worksheet. */
export const ROW_HEADER = [
  "timestamp",
  "share_id",
  "nickname",
  "innovation",
  "collaboration",
  "leadership",
  "tech_acumen",
  "innovation_score",
  "collaboration_score",
  "leadership_score",
  "tech_acumen_score",
  "analysis",
  "golden_sentence",
] as const;

export type SheetRow = string[];

export function toRow(r: ShareRecord): SheetRow {
  const { scores } = r.result;
  return [
    r.timestamp,
    r.share_id,
    r.nickname,
    r.inputs.innovation,
    r.inputs.collaboration,
    r.inputs.leadership,
    r.inputs.tech_acumen,
    String(scores.innovation),
    String(scores.collaboration),
    String(scores.leadership),
    String(scores.tech_acumen),
    r.result.analysis,
    r.result.golden_sentence,
  ];
}

const cell = (row: readonly unknown[], i: number): string => {
  const v = row[i];
  return v == null ? "" : String(v);
};

export function isHeaderRow(row: readonly unknown[]): boolean {
  return cell(row, 0) === ROW_HEADER[0] && cell(row, 1) === ROW_HEADER[1];
}

export function fromRow(row: readonly unknown[]): ShareRecord {
  const scores = resolveScores({
    kind: "flat",
    innovation_score: cell(row, 7),
    collaboration_score: cell(row, 8),
    leadership_score: cell(row, 9),
    tech_acumen_score: cell(row, 10),
  });
  const result: AnalysisResult = normalizeAnalysis({
    scores,
    analysis: cell(row, 11),
    golden_sentence: cell(row, 12),
  });
  return {
    timestamp: cell(row, 0),
    share_id: cell(row, 1),
    nickname: cell(row, 2),
    inputs: {
      innovation: cell(row, 3),
      collaboration: cell(row, 4),
      leadership: cell(row, 5),
      tech_acumen: cell(row, 6),
    },
    result,
  };
}
