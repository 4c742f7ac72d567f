import { z } from "zod";
import { MESSAGES, type MalformedResponseError } from "./errors";
import { err, ok, type Result } from "./result";
import type { AnalysisResult, Scores } from "./types";

export const FALLBACK_ANALYSIS = "暂无详细分析，请补充更多细节后重新生成。";
export const FALLBACK_GOLDEN_SENTENCE = "保持好奇，持续成长。";

/** Integer coercion: numbers truncate, numeric strings parse, anything else is 0. Result is clamped to 0..100. */
export function coerceScore(v: unknown): number {
  let n = NaN;
  if (typeof v === "number") n = v;
  else if (typeof v === "string" && v.trim() !== "") n = Number(v.trim());
  if (!Number.isFinite(n)) return 0;
  return Math.min(100, Math.max(0, Math.trunc(n)));
}

const ScoreField = z.unknown().transform(coerceScore);

export const ScoresSchema = z
  .object({
    innovation: ScoreField,
    collaboration: ScoreField,
    leadership: ScoreField,
    tech_acumen: ScoreField,
  })
  .catch({ innovation: 0, collaboration: 0, leadership: 0, tech_acumen: 0 });

/*
 * Scores arrive in two shapes: nested under `scores` (model output)
 * or as flat `*_score` columns (sheet rows). Both resolve here.
 */
export type ScoreShape =
  | { kind: "nested"; scores: unknown }
  | {
      kind: "flat";
      innovation_score: unknown;
      collaboration_score: unknown;
      leadership_score: unknown;
      tech_acumen_score: unknown;
    };

export function resolveScores(shape: ScoreShape): Scores {
  switch (shape.kind) {
    case "nested":
      return ScoresSchema.parse(shape.scores ?? {});
    case "flat":
      return ScoresSchema.parse({
        innovation: shape.innovation_score,
        collaboration: shape.collaboration_score,
        leadership: shape.leadership_score,
        tech_acumen: shape.tech_acumen_score,
      });
  }
}

const textOr = (fallback: string) =>
  z
    .string()
    .transform((s) => s.trim())
    .pipe(z.string().min(1))
    .catch(fallback);

const AnalysisSchema = z.object({
  scores: z.unknown().transform((scores) => resolveScores({ kind: "nested", scores })),
  analysis: textOr(FALLBACK_ANALYSIS),
  golden_sentence: textOr(FALLBACK_GOLDEN_SENTENCE),
});

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

const isObject = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/**
 * Direct parse first; on failure, parse the greedy `{...}` span
 * (the model sometimes wraps the JSON in prose or code fences).
 */
export function extractJsonObject(raw: string): Record<string, unknown> | undefined {
  const text = raw.trim();
  const direct = tryJson(text);
  if (isObject(direct)) return direct;

  const match = /\{.*\}/s.exec(text);
  if (!match) return undefined;
  const extracted = tryJson(match[0]);
  return isObject(extracted) ? extracted : undefined;
}

export function normalizeAnalysis(json: Record<string, unknown>): AnalysisResult {
  return AnalysisSchema.parse(json);
}

export function parseAnalysis(raw: string): Result<AnalysisResult, MalformedResponseError> {
  const json = extractJsonObject(raw);
  if (!json) {
    return err({ kind: "malformed_response", message: MESSAGES.malformed, raw });
  }
  return ok(normalizeAnalysis(json));
}
