import { GoogleGenerativeAI } from "@google/generative-ai";
import type { AppConfig } from "./config";
import {
  describeCause,
  MESSAGES,
  type ConfigurationError,
  type TransportError,
} from "./errors";
import type { PromptPair } from "./prompt";
import { err, ok, type Result } from "./result";

/** One stateless completion call returning the raw response text. */
export interface AnalysisModel {
  generate(prompt: PromptPair): Promise<Result<string, TransportError>>;
}

export type LlmConfig = AppConfig["llm"];

export class GeminiAnalysisModel implements AnalysisModel {
  private readonly genAI: GoogleGenerativeAI;

  constructor(apiKey: string, private readonly config: LlmConfig) {
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async generate(prompt: PromptPair): Promise<Result<string, TransportError>> {
    const model = this.genAI.getGenerativeModel(
      {
        model: this.config.model,
        systemInstruction: prompt.system,
        generationConfig: {
          // JSON only
          responseMimeType: "application/json",
          maxOutputTokens: this.config.maxOutputTokens,
          temperature: this.config.temperature,
        },
      },
      { timeout: this.config.timeoutMs },
    );

    try {
      const resp = await model.generateContent(prompt.user);
      return ok(resp.response.text().trim());
    } catch (e) {
      console.error("[llm] generateContent failed:", e);
      return err({ kind: "transport", message: MESSAGES.transport, cause: describeCause(e) });
    }
  }
}

/** Fails before any network call when the key is not configured. */
export function createAnalysisModel(config: LlmConfig): Result<AnalysisModel, ConfigurationError> {
  if (!config.apiKey) {
    return err({ kind: "configuration", message: MESSAGES.configuration });
  }
  return ok(new GeminiAnalysisModel(config.apiKey, config));
}
