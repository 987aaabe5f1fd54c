import fs from "fs";
import readline from "readline";
import { isLocated, ResolutionOutcome } from "../models/geo-data";

export const RESULTS_HEADER = ["Relay URL", "Latitude", "Longitude"] as const;

/**
 * Split raw text into endpoints, one per line, dropping blank lines
 */
export function parseEndpointLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Read endpoints from a file. A missing file is treated as an empty list.
 */
export async function readEndpointsFromFile(filePath: string): Promise<string[]> {
  if (!fs.existsSync(filePath)) {
    console.warn(`Input file not found: ${filePath}`);
    return [];
  }
  return parseEndpointLines(await fs.promises.readFile(filePath, "utf-8"));
}

/**
 * Read endpoints piped on standard input. An interactive terminal is never
 * waited on.
 */
export async function readEndpointsFromStdin(
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin
): Promise<string[]> {
  if (input.isTTY) {
    return [];
  }

  const endpoints: string[] = [];
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  for await (const line of lines) {
    const trimmed = line.trim();
    if (trimmed) endpoints.push(trimmed);
  }
  return endpoints;
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render located outcomes as CSV, in the order given. Absent outcomes are
 * left out.
 */
export function formatResultsCsv(
  outcomes: ReadonlyArray<ResolutionOutcome>
): string {
  const lines = [RESULTS_HEADER.join(",")];
  for (const outcome of outcomes) {
    if (!isLocated(outcome)) continue;
    lines.push(
      [outcome.endpoint, outcome.latitude, outcome.longitude]
        .map(escapeCsvField)
        .join(",")
    );
  }
  return lines.join("\n") + "\n";
}

/**
 * Write the results CSV, replacing any existing file
 *
 * @returns The number of located rows written
 */
export async function writeResultsCsv(
  filePath: string,
  outcomes: ReadonlyArray<ResolutionOutcome>
): Promise<number> {
  await fs.promises.writeFile(filePath, formatResultsCsv(outcomes), "utf-8");
  return outcomes.filter(isLocated).length;
}
