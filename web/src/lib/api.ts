import type { z } from "zod";
import {
  AnalysisOutcomeSchema,
  ErrorBodySchema,
  ReplayOutcomeSchema,
  type AnalysisOutcome,
  type Answers,
} from "./types";

export type ApiResult<T> = { ok: true; value: T } | { ok: false; message: string };

export function apiBase(): string {
  return import.meta.env.VITE_API_URL?.replace(/\/$/, "") || "http://localhost:8080";
}

async function readJson<T>(res: Response, schema: z.ZodType<T>): Promise<ApiResult<T>> {
  const text = await res.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    // never show an HTML error page to the user
    return { ok: false, message: `请求失败（HTTP ${res.status}），请稍后重试` };
  }
  if (!res.ok) {
    const e = ErrorBodySchema.safeParse(body);
    return { ok: false, message: e.success ? e.data.error.message : `HTTP ${res.status}` };
  }
  const parsed = schema.safeParse(body);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false, message: "unexpected response" };
}

export async function requestAnalysis(
  base: string,
  nickname: string,
  answers: Answers,
): Promise<ApiResult<AnalysisOutcome>> {
  try {
    const res = await fetch(`${base}/analyze`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ nickname, ...answers }),
    });
    return await readJson(res, AnalysisOutcomeSchema);
  } catch (e) {
    return { ok: false, message: e instanceof Error ? e.message : "network error" };
  }
}

/** Replays a stored record in the same shape as a fresh analysis. */
export async function requestShare(base: string, shareId: string): Promise<ApiResult<AnalysisOutcome>> {
  try {
    const res = await fetch(`${base}/share/${encodeURIComponent(shareId)}`);
    const replay = await readJson(res, ReplayOutcomeSchema);
    if (!replay.ok) return replay;
    const { record, result, chart, shareUrl } = replay.value;
    return {
      ok: true,
      value: {
        nickname: record.nickname,
        result,
        chart,
        share: { saved: true, shareId: record.share_id, url: shareUrl },
      },
    };
  } catch (e) {
    return { ok: false, message: e instanceof Error ? e.message : "network error" };
  }
}

export const qrImageUrl = (base: string, shareId: string) =>
  `${base}/share/${encodeURIComponent(shareId)}/qr.png`;
