import { randomUUID } from "crypto";
import { MESSAGES, type ConfigurationError, type PipelineError } from "./errors";
import type { AnalysisModel } from "./llmClient";
import { parseAnalysis } from "./parser";
import { buildPrompt } from "./prompt";
import { buildRadarSeries } from "./radar";
import { err, ok, type Result } from "./result";
import type { RecordStore } from "./store";
import type { AnalysisResult, RadarSeries, ShareRecord, Submission } from "./types";
import { validateSubmission } from "./validator";

export const DEFAULT_DISPLAY_NAME = "你";

export interface ShareStatus {
  saved: boolean;
  shareId: string | null;
  /** the link shown, copied and encoded in the QR code */
  url: string | null;
  notice?: string;
}

export interface AnalysisOutcome {
  nickname: string;
  result: AnalysisResult;
  chart: RadarSeries;
  share: ShareStatus;
}

export interface ReplayOutcome {
  record: ShareRecord;
  result: AnalysisResult;
  chart: RadarSeries;
  shareUrl: string;
}

export interface PipelineDeps {
  model: Result<AnalysisModel, ConfigurationError>;
  store: RecordStore | null;
  publicAppUrl: string;
  now?: () => Date;
  newShareId?: () => string;
}

export function shareUrl(publicAppUrl: string, shareId: string): string {
  return `${publicAppUrl}/?share=${encodeURIComponent(shareId)}`;
}

export const generateShareId = (): string => randomUUID().replace(/-/g, "").slice(0, 12);

const displayName = (nickname: string) => nickname || DEFAULT_DISPLAY_NAME;

/**
 * validate → model → parse → persist (best effort) → chart.
 * Nothing reaches the model unless all four answers are present.
 */
export async function runAnalysis(
  submission: Submission,
  deps: PipelineDeps,
): Promise<Result<AnalysisOutcome, PipelineError>> {
  const validated = validateSubmission(submission);
  if (!validated.ok) return validated;
  if (!deps.model.ok) return deps.model;

  const { nickname, inputs } = validated.value;
  const raw = await deps.model.value.generate(buildPrompt(inputs, nickname));
  if (!raw.ok) return raw;

  const parsed = parseAnalysis(raw.value);
  if (!parsed.ok) {
    console.error("[analyze] could not parse model output:", parsed.error.raw);
    return parsed;
  }
  const result = parsed.value;

  let share: ShareStatus = { saved: false, shareId: null, url: null, notice: MESSAGES.storeDisabled };
  if (deps.store) {
    const record: ShareRecord = {
      timestamp: (deps.now ?? (() => new Date()))().toISOString(),
      share_id: (deps.newShareId ?? generateShareId)(),
      nickname,
      inputs,
      result,
    };
    const saved = await deps.store.append(record);
    share = saved.ok
      ? { saved: true, shareId: record.share_id, url: shareUrl(deps.publicAppUrl, record.share_id) }
      : { saved: false, shareId: null, url: null, notice: saved.error.message };
  }

  return ok({
    nickname,
    result,
    chart: buildRadarSeries(result.scores, displayName(nickname)),
    share,
  });
}

/** Share-link visit: read the stored record and rebuild the chart. No model call. */
export async function replayShare(
  shareId: string,
  deps: Pick<PipelineDeps, "store" | "publicAppUrl">,
): Promise<Result<ReplayOutcome, PipelineError>> {
  const { store } = deps;
  if (!store) {
    return err({ kind: "configuration", message: MESSAGES.shareDisabled });
  }
  const found = await store.findByShareId(shareId.trim());
  if (!found.ok) return found;
  if (!found.value) return err({ kind: "not_found", message: MESSAGES.notFound });

  const record = found.value;
  return ok({
    record,
    result: record.result,
    chart: buildRadarSeries(record.result.scores, displayName(record.nickname)),
    shareUrl: shareUrl(deps.publicAppUrl, record.share_id),
  });
}
