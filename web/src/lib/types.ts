import { z } from "zod";

export const DIMENSIONS = ["innovation", "collaboration", "leadership", "tech_acumen"] as const;
export type Dimension = (typeof DIMENSIONS)[number];

const ScoresSchema = z.object({
  innovation: z.number(),
  collaboration: z.number(),
  leadership: z.number(),
  tech_acumen: z.number(),
});

export const AnalysisResultSchema = z.object({
  scores: ScoresSchema,
  analysis: z.string(),
  golden_sentence: z.string(),
});

export const RadarSeriesSchema = z.object({
  title: z.string(),
  domain: z.tuple([z.number(), z.number()]),
  points: z.array(
    z.object({
      key: z.enum(DIMENSIONS),
      category: z.string(),
      value: z.number(),
    }),
  ),
});

export const AnalysisOutcomeSchema = z.object({
  nickname: z.string(),
  result: AnalysisResultSchema,
  chart: RadarSeriesSchema,
  share: z.object({
    saved: z.boolean(),
    shareId: z.string().nullable(),
    url: z.string().nullable(),
    notice: z.string().optional(),
  }),
});

export const ReplayOutcomeSchema = z.object({
  record: z.object({
    timestamp: z.string(),
    share_id: z.string(),
    nickname: z.string(),
  }),
  result: AnalysisResultSchema,
  chart: RadarSeriesSchema,
  shareUrl: z.string(),
});

export const ErrorBodySchema = z.object({
  error: z.object({ kind: z.string(), message: z.string() }),
});

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
export type RadarSeries = z.infer<typeof RadarSeriesSchema>;
export type AnalysisOutcome = z.infer<typeof AnalysisOutcomeSchema>;
export type ReplayOutcome = z.infer<typeof ReplayOutcomeSchema>;

export type Answers = Record<Dimension, string>;
