import "dotenv/config";
import { fileURLToPath } from "url";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createAnalysisModel } from "./llmClient";
import { createRecordStore } from "./store";

/* =========================
   Startup
   ========================= */
const config = loadConfig();

const model = createAnalysisModel(config.llm);
if (!model.ok) {
  console.warn("[WARN] GEMINI_API_KEY is not set. /analyze will fail.");
}

const store = createRecordStore(config.store);
console.log(`[store] ${store ? config.store.kind : "disabled"}`);

const publicDir = fileURLToPath(new URL("../../web/dist", import.meta.url));

createApp({ config, model, store, publicDir }).listen(config.port, () => {
  console.log(`API on :${config.port}`);
});
