import { readFile } from "node:fs/promises";
import { log, errorMessage } from "../utils/logger.js";

export interface AirportRecord {
  skyId: string;
  entityId: string;
  entityType: string;
}

export interface ReferenceDataProvider {
  getMarkets(): readonly string[];
  getAirports(): readonly AirportRecord[];
}

export class StaticReferenceData implements ReferenceDataProvider {
  private readonly markets: readonly string[];
  private readonly airports: readonly AirportRecord[];

  constructor(markets: Iterable<string>, airports: readonly AirportRecord[]) {
    this.markets = [...new Set(markets)];
    // One record per code, so two draws without replacement never collide.
    const byCode = new Map<string, AirportRecord>();
    for (const a of airports) {
      if (a.entityType === "AIRPORT" && !byCode.has(a.skyId)) {
        byCode.set(a.skyId, a);
      }
    }
    this.airports = [...byCode.values()];
  }

  getMarkets(): readonly string[] {
    return this.markets;
  }

  getAirports(): readonly AirportRecord[] {
    return this.airports;
  }
}

/**
 * Minimal RFC 4180 reader: header row, comma separated, double quotes with
 * "" escapes. Blank lines are skipped.
 */
export function parseCsv(text: string): Array<Record<string, string>> {
  const rows: string[][] = [];
  let field = "";
  let row: string[] = [];
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  const nonEmpty = rows.filter((r) => r.some((cell) => cell.trim() !== ""));
  const [header, ...body] = nonEmpty;
  if (!header) return [];

  const columns = header.map((h) => h.trim());
  return body.map((cells) => {
    const record: Record<string, string> = {};
    columns.forEach((name, idx) => {
      record[name] = (cells[idx] ?? "").trim();
    });
    return record;
  });
}

export async function loadMarkets(path: string): Promise<string[]> {
  try {
    const records = parseCsv(await readFile(path, "utf8"));
    return records
      .map((r) => r["MarketCode"] ?? "")
      .filter((code) => code.length > 0);
  } catch (err) {
    log.error("Failed to load markets", { path, error: errorMessage(err) });
    return [];
  }
}

export async function loadAirports(path: string): Promise<AirportRecord[]> {
  try {
    const records = parseCsv(await readFile(path, "utf8"));
    return records
      .map((r) => ({
        skyId: r["skyId"] ?? "",
        entityId: r["entityId"] ?? "",
        entityType: r["entityType"] ?? "",
      }))
      .filter((a) => a.skyId.length > 0 && a.entityType === "AIRPORT");
  } catch (err) {
    log.error("Failed to load airports", { path, error: errorMessage(err) });
    return [];
  }
}

export async function loadReferenceData(
  marketsFile: string,
  airportsFile: string
): Promise<StaticReferenceData> {
  const [markets, airports] = await Promise.all([
    loadMarkets(marketsFile),
    loadAirports(airportsFile),
  ]);
  log.info("Loaded reference data", {
    markets: markets.length,
    airports: airports.length,
  });
  return new StaticReferenceData(markets, airports);
}
