import fs from "fs";
import csv from "csv-parser";
import { encodeGeohash } from "./geohash-util";
import { escapeCsvField } from "./relay-io";

export const GEOHASH_COLUMN = "Geohash";

interface ParsedCsv {
  headers: string[];
  rows: Record<string, string>[];
}

function readCsv(filePath: string): Promise<ParsedCsv> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: Record<string, string>[] = [];

    fs.createReadStream(filePath)
      .on("error", reject)
      .pipe(csv())
      .on("headers", (columns: string[]) => {
        headers = columns;
      })
      .on("data", (row: Record<string, string>) => {
        rows.push(row);
      })
      .on("end", () => {
        resolve({ headers, rows });
      })
      .on("error", reject);
  });
}

function parseCoordinate(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Copy a relays CSV (Relay URL,Latitude,Longitude,...) to outputPath with a
 * Geohash column appended. Rows whose coordinates do not parse get an empty
 * geohash.
 *
 * @returns The number of data rows written
 */
export async function addGeohashColumn(
  inputPath: string,
  outputPath: string,
  precision = 7
): Promise<number> {
  const { headers, rows } = await readCsv(inputPath);

  if (!headers.includes("Latitude") || !headers.includes("Longitude")) {
    throw new Error("Input CSV must contain Latitude and Longitude columns");
  }

  const columns = headers.includes(GEOHASH_COLUMN)
    ? headers
    : [...headers, GEOHASH_COLUMN];

  const lines = [columns.map(escapeCsvField).join(",")];
  for (const row of rows) {
    const lat = parseCoordinate(row.Latitude);
    const lon = parseCoordinate(row.Longitude);
    const geohash =
      lat !== null && lon !== null ? encodeGeohash(lat, lon, precision) : "";

    const values: Record<string, string> = {
      ...row,
      [GEOHASH_COLUMN]: geohash,
    };
    lines.push(
      columns.map((column) => escapeCsvField(values[column] ?? "")).join(",")
    );
  }

  await fs.promises.writeFile(outputPath, lines.join("\n") + "\n", "utf-8");
  return rows.length;
}
