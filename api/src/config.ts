import { z } from "zod";

/* =========================
   Environment and defaults
   ========================= */
const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  GEMINI_API_KEY: optionalText,
  GEMINI_MODEL: z.string().default("gemini-1.5-flash"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(1000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  RECORD_STORE: z.enum(["sheets", "memory", "none"]).optional(),
  SHEETS_SPREADSHEET_ID: optionalText,
  SHEETS_WORKSHEET: z.string().default("records"),
  GOOGLE_SERVICE_ACCOUNT_JSON: optionalText,
  PUBLIC_APP_URL: optionalText,
  BODY_LIMIT: z.string().default("10mb"),
});

export type RecordStoreKind = "sheets" | "memory" | "none";

export interface AppConfig {
  port: number;
  llm: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
    maxOutputTokens: number;
    temperature: number;
  };
  store: {
    kind: RecordStoreKind;
    spreadsheetId?: string;
    worksheet: string;
    serviceAccountJson?: string;
  };
  publicAppUrl: string;
  /** request body size accepted by express.json */
  bodyLimit: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(env);
  return {
    port: e.PORT,
    llm: {
      apiKey: e.GEMINI_API_KEY,
      model: e.GEMINI_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxOutputTokens: e.LLM_MAX_OUTPUT_TOKENS,
      temperature: e.LLM_TEMPERATURE,
    },
    store: {
      kind: e.RECORD_STORE ?? (e.SHEETS_SPREADSHEET_ID ? "sheets" : "none"),
      spreadsheetId: e.SHEETS_SPREADSHEET_ID,
      worksheet: e.SHEETS_WORKSHEET,
      serviceAccountJson: e.GOOGLE_SERVICE_ACCOUNT_JSON,
    },
    publicAppUrl: (e.PUBLIC_APP_URL ?? `http://localhost:${e.PORT}`).replace(/\/$/, ""),
    bodyLimit: e.BODY_LIMIT,
  };
}
