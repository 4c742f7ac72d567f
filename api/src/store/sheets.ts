import { google } from "googleapis";
import { z } from "zod";
import { describeCause, MESSAGES, type PersistenceError } from "../errors";
import { err, ok, type Result } from "../result";
import type { ShareRecord } from "../types";
import { fromRow, isHeaderRow, ROW_HEADER, toRow, type SheetRow } from "./rows";
import type { RecordStore } from "./types";

/** Row-level access to one worksheet. */
export interface SheetGateway {
  appendRow(row: SheetRow): Promise<void>;
  readRows(): Promise<unknown[][]>;
}

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];
const LAST_COLUMN = String.fromCharCode("A".charCodeAt(0) + ROW_HEADER.length - 1);

const ServiceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export interface GoogleSheetOptions {
  spreadsheetId: string;
  worksheet: string;
  serviceAccountJson: string;
}

/** Throws when the credential is not a service-account JSON document. */
export function createGoogleSheetGateway(opts: GoogleSheetOptions): SheetGateway {
  const credentials = ServiceAccountSchema.parse(JSON.parse(opts.serviceAccountJson));
  const auth = new google.auth.GoogleAuth({ credentials, scopes: SCOPES });
  const sheets = google.sheets({ version: "v4", auth });
  const range = `${opts.worksheet}!A:${LAST_COLUMN}`;

  return {
    async appendRow(row) {
      await sheets.spreadsheets.values.append({
        spreadsheetId: opts.spreadsheetId,
        range,
        valueInputOption: "RAW",
        insertDataOption: "INSERT_ROWS",
        requestBody: { values: [row] },
      });
    },
    async readRows() {
      const res = await sheets.spreadsheets.values.get({
        spreadsheetId: opts.spreadsheetId,
        range,
      });
      return res.data.values ?? [];
    },
  };
}

export class SheetRecordStore implements RecordStore {
  constructor(private readonly gateway: SheetGateway) {}

  async append(record: ShareRecord): Promise<Result<void, PersistenceError>> {
    try {
      await this.gateway.appendRow(toRow(record));
      return ok(undefined);
    } catch (e) {
      console.error("[store] append failed:", e);
      return err({ kind: "persistence", message: MESSAGES.persistence, cause: describeCause(e) });
    }
  }

  /** Linear scan; the first row with a matching id wins. */
  async findByShareId(shareId: string): Promise<Result<ShareRecord | null, PersistenceError>> {
    let rows: unknown[][];
    try {
      rows = await this.gateway.readRows();
    } catch (e) {
      console.error("[store] read failed:", e);
      return err({ kind: "persistence", message: MESSAGES.persistence, cause: describeCause(e) });
    }
    const row = rows.find((r) => !isHeaderRow(r) && String(r[1] ?? "") === shareId);
    return ok(row ? fromRow(row) : null);
  }
}
