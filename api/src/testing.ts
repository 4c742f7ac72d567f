import type { AnalysisModel } from "./llmClient";
import type { PromptPair } from "./prompt";
import { err, ok } from "./result";
import type { SheetGateway } from "./store";
import type { SheetRow } from "./store/rows";

/** Model stub returning canned text and recording prompts. */
export function stubModel(reply: string | Error) {
  const prompts: PromptPair[] = [];
  const model: AnalysisModel = {
    async generate(prompt) {
      prompts.push(prompt);
      return typeof reply === "string"
        ? ok(reply)
        : err({ kind: "transport", message: "transport", cause: reply.message });
    },
  };
  return { model, prompts };
}

/** In-memory worksheet. `fail` makes every call reject. */
export class FakeSheet implements SheetGateway {
  rows: unknown[][] = [];
  fail: Error | null = null;

  async appendRow(row: SheetRow) {
    if (this.fail) throw this.fail;
    this.rows.push([...row]);
  }

  async readRows() {
    if (this.fail) throw this.fail;
    return this.rows.map((r) => [...r]);
  }
}
