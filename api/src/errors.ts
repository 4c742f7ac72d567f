import type { Dimension } from "./types";

/* =========================
   Pipeline error taxonomy
   ========================= */
export type ValidationError = {
  kind: "validation";
  message: string;
  missing: Dimension[];
};

export type ConfigurationError = { kind: "configuration"; message: string };

export type TransportError = { kind: "transport"; message: string; cause?: string };

export type MalformedResponseError = { kind: "malformed_response"; message: string; raw: string };

export type PersistenceError = { kind: "persistence"; message: string; cause?: string };

export type NotFoundError = { kind: "not_found"; message: string };

export type PipelineError =
  | ValidationError
  | ConfigurationError
  | TransportError
  | MalformedResponseError
  | PersistenceError
  | NotFoundError;

export type PipelineErrorKind = PipelineError["kind"];

/** User-facing messages. */
export const MESSAGES = {
  validation: "⚠️ 请完整回答所有四个问题，这样AI才能给出更准确的分析哦！",
  configuration: "❌ API密钥未配置，请联系管理员",
  transport: "❌ AI 服务暂时无法连接，请稍后重新提交",
  malformed: "😅 分析出了一点小问题，请您调整一下输入内容再试试。确保每个问题都有详细的回答哦！",
  persistence: "结果已生成，但暂时无法保存，分享链接不可用，请稍后再试",
  storeDisabled: "结果未保存：分享功能未启用",
  notFound: "找不到这条分享记录，链接可能已失效",
  shareDisabled: "分享功能未启用，暂时无法查看这条分享记录",
  badBody: "提交的内容格式有误，请刷新页面后重新提交",
  bodyTooLarge: "回答内容过长，请精简后再提交",
} as const;

export const HTTP_STATUS: Record<PipelineErrorKind, number> = {
  validation: 400,
  configuration: 500,
  transport: 502,
  malformed_response: 502,
  persistence: 503,
  not_found: 404,
};

export function describeCause(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
