import type { AppConfig } from "../config";
import { MemoryRecordStore } from "./memory";
import { createGoogleSheetGateway, SheetRecordStore } from "./sheets";
import type { RecordStore } from "./types";

export type { RecordStore } from "./types";
export { MemoryRecordStore } from "./memory";
export { SheetRecordStore, type SheetGateway } from "./sheets";

/** Returns null when persistence is disabled or cannot be set up. */
export function createRecordStore(config: AppConfig["store"]): RecordStore | null {
  switch (config.kind) {
    case "none":
      return null;
    case "memory":
      return new MemoryRecordStore();
    case "sheets": {
      if (!config.spreadsheetId || !config.serviceAccountJson) {
        console.warn("[WARN] SHEETS_SPREADSHEET_ID or GOOGLE_SERVICE_ACCOUNT_JSON is not set; sharing disabled.");
        return null;
      }
      try {
        return new SheetRecordStore(
          createGoogleSheetGateway({
            spreadsheetId: config.spreadsheetId,
            worksheet: config.worksheet,
            serviceAccountJson: config.serviceAccountJson,
          }),
        );
      } catch (e) {
        console.warn("[WARN] service account credential could not be read; sharing disabled.", e);
        return null;
      }
    }
  }
}
