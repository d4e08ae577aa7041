import { google, sheets_v4 } from "googleapis";
import { TableNotFoundError } from "../domain/errors";
import { logger } from "../lib/logger";
import { RemoteTabularStore } from "./remoteTabularStore";

const log = logger.child("googleSheets");

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

export interface GoogleSheetsStoreOptions {
  spreadsheetId: string;
  /** Service account key file; application default credentials otherwise */
  credentialsFile?: string | null;
  /** Logical table name that maps to the spreadsheet's first sheet */
  primaryTable?: string;
}

interface SheetProperties {
  sheetId: number;
  title: string;
}

/** Column number (1-based) to A1 letters: 1 → A, 27 → AA. */
export function columnLetter(columnNumber: number): string {
  let remaining = columnNumber;
  let letters = "";
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

function quoteTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

/**
 * RemoteTabularStore backed by the Google Sheets v4 API.
 * Values are written RAW so a re-fetch returns exactly the text sent.
 */
export class GoogleSheetsStore implements RemoteTabularStore {
  private readonly api: sheets_v4.Sheets;
  private readonly spreadsheetId: string;
  private readonly primaryTable: string | null;
  private sheetsByTitle: Map<string, SheetProperties> | null = null;
  private firstSheet: SheetProperties | null = null;

  constructor(options: GoogleSheetsStoreOptions) {
    const auth = new google.auth.GoogleAuth({
      keyFile: options.credentialsFile ?? undefined,
      scopes: SCOPES,
    });
    this.api = google.sheets({ version: "v4", auth });
    this.spreadsheetId = options.spreadsheetId;
    this.primaryTable = options.primaryTable ?? null;
  }

  async fetchAll(table: string): Promise<string[][]> {
    const sheet = await this.resolve(table);
    const response = await this.api.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: quoteTitle(sheet.title),
      majorDimension: "ROWS",
      valueRenderOption: "FORMATTED_VALUE",
    });
    const rows: unknown[][] = response.data.values ?? [];
    return rows.map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
  }

  async appendRow(table: string, values: string[]): Promise<void> {
    const sheet = await this.resolve(table);
    await this.api.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteTitle(sheet.title)}!A1`,
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: [values] },
    });
  }

  async updateRowRange(table: string, rowNumber: number, values: string[]): Promise<void> {
    const sheet = await this.resolve(table);
    await this.api.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteTitle(sheet.title)}!A${rowNumber}`,
      valueInputOption: "RAW",
      requestBody: { values: [values] },
    });
  }

  async createSheet(table: string): Promise<void> {
    await this.api.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            addSheet: {
              properties: { title: table, gridProperties: { rowCount: 1000, columnCount: 20 } },
            },
          },
        ],
      },
    });
    this.sheetsByTitle = null;
    log.info("Sheet created", { table });
  }

  async setCellValue(
    table: string,
    rowNumber: number,
    columnNumber: number,
    value: string
  ): Promise<void> {
    const sheet = await this.resolve(table);
    await this.api.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteTitle(sheet.title)}!${columnLetter(columnNumber)}${rowNumber}`,
      valueInputOption: "RAW",
      requestBody: { values: [[value]] },
    });
  }

  async deleteRow(table: string, rowNumber: number): Promise<void> {
    await this.deleteDimension(table, "ROWS", rowNumber);
  }

  async deleteColumn(table: string, columnNumber: number): Promise<void> {
    await this.deleteDimension(table, "COLUMNS", columnNumber);
  }

  private async deleteDimension(
    table: string,
    dimension: "ROWS" | "COLUMNS",
    position: number
  ): Promise<void> {
    const sheet = await this.resolve(table);
    await this.api.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            deleteDimension: {
              range: {
                sheetId: sheet.sheetId,
                dimension,
                startIndex: position - 1,
                endIndex: position,
              },
            },
          },
        ],
      },
    });
  }

  private async resolve(table: string): Promise<SheetProperties> {
    if (!this.sheetsByTitle) {
      await this.loadSheetProperties();
    }

    if (table === this.primaryTable && this.firstSheet) {
      return this.firstSheet;
    }
    const sheet = this.sheetsByTitle?.get(table);
    if (!sheet) {
      throw new TableNotFoundError(table);
    }
    return sheet;
  }

  private async loadSheetProperties(): Promise<void> {
    const response = await this.api.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: "sheets.properties(sheetId,title,index)",
    });

    const byTitle = new Map<string, SheetProperties>();
    let first: SheetProperties | null = null;
    let firstIndex = Number.POSITIVE_INFINITY;
    for (const sheet of response.data.sheets ?? []) {
      const properties = sheet.properties;
      if (!properties || properties.title == null || properties.sheetId == null) continue;
      const entry = { sheetId: properties.sheetId, title: properties.title };
      byTitle.set(entry.title, entry);
      const index = properties.index ?? 0;
      if (index < firstIndex) {
        firstIndex = index;
        first = entry;
      }
    }

    this.sheetsByTitle = byTitle;
    this.firstSheet = first;
  }
}
