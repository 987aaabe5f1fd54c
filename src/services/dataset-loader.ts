import fs from "fs";
import csv from "csv-parser";
import { IpRangeRecord } from "../models/geo-data";
import {
  DatasetAcquisitionError,
  DatasetLoadError,
  errorMessage,
} from "./errors";
import { IntervalIndex } from "./interval-index";
import { IpUtil } from "./ip-util";

/**
 * Dataset layout: start,end,continent,country,state1,state2,city,latitude,longitude
 */
export const DATASET_COLUMNS = {
  start: 0,
  end: 1,
  latitude: 7,
  longitude: 8,
} as const;
export const MIN_DATASET_COLUMNS = 9;

export type SkipReason =
  | "comment"
  | "too-few-columns"
  | "invalid-range"
  | "missing-location";

export type RowDecision =
  | { kind: "record"; record: IpRangeRecord }
  | { kind: "skip"; reason: SkipReason };

export interface LoadStats {
  totalRows: number;
  loaded: number;
  skipped: Record<SkipReason, number>;
}

export interface LoadResult {
  index: IntervalIndex;
  stats: LoadStats;
}

/**
 * Something that can put the dataset file in place when it is missing
 */
export interface DatasetAcquirer {
  download(targetPath: string): Promise<void>;
}

function parseRangeBound(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const value = Number(trimmed);
  return IpUtil.isUint32(value) ? value : null;
}

/**
 * Classify one dataset row as a usable record or a typed skip
 */
export function parseDatasetRow(fields: ReadonlyArray<string>): RowDecision {
  if (fields.length > 0 && fields[0].startsWith("#")) {
    return { kind: "skip", reason: "comment" };
  }
  if (fields.length < MIN_DATASET_COLUMNS) {
    return { kind: "skip", reason: "too-few-columns" };
  }

  const start = parseRangeBound(fields[DATASET_COLUMNS.start]);
  const end = parseRangeBound(fields[DATASET_COLUMNS.end]);
  if (start === null || end === null) {
    return { kind: "skip", reason: "invalid-range" };
  }

  const latitude = fields[DATASET_COLUMNS.latitude];
  const longitude = fields[DATASET_COLUMNS.longitude];
  if (!latitude || !longitude) {
    return { kind: "skip", reason: "missing-location" };
  }

  return { kind: "record", record: { start, end, latitude, longitude } };
}

/**
 * csv-parser keys header-less rows by column position
 */
function rowToFields(row: Record<string, string>): string[] {
  const fields: string[] = [];
  for (let i = 0; i in row; i++) {
    fields.push(row[i]);
  }
  return fields;
}

/**
 * Loads the IP range dataset into an IntervalIndex, fetching it first when the
 * file is missing
 */
export class DatasetLoader {
  constructor(private readonly acquirer: DatasetAcquirer) {}

  /**
   * @throws DatasetAcquisitionError when the file is missing and cannot be fetched
   */
  async ensurePresent(datasetPath: string): Promise<void> {
    if (fs.existsSync(datasetPath)) {
      return;
    }

    try {
      await this.acquirer.download(datasetPath);
    } catch (error) {
      if (error instanceof DatasetAcquisitionError) throw error;
      throw new DatasetAcquisitionError(
        `Error setting up database: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Read the dataset in file order. Malformed rows are skipped and counted.
   *
   * @throws DatasetAcquisitionError when the file is missing and cannot be fetched
   * @throws DatasetLoadError when the file cannot be read
   */
  async load(datasetPath: string): Promise<LoadResult> {
    await this.ensurePresent(datasetPath);

    console.log("Loading GeoIP database into memory...");
    const { records, stats } = await this.readRecords(datasetPath);
    const index = IntervalIndex.build(records);

    const skippedTotal = stats.totalRows - stats.loaded;
    console.log(
      `Loaded ${index.size} IP ranges.` +
        (skippedTotal > 0 ? ` Skipped ${skippedTotal} rows.` : "")
    );

    return { index, stats };
  }

  private readRecords(
    datasetPath: string
  ): Promise<{ records: IpRangeRecord[]; stats: LoadStats }> {
    const records: IpRangeRecord[] = [];
    const stats: LoadStats = {
      totalRows: 0,
      loaded: 0,
      skipped: {
        comment: 0,
        "too-few-columns": 0,
        "invalid-range": 0,
        "missing-location": 0,
      },
    };

    return new Promise((resolve, reject) => {
      const fail = (error: unknown) =>
        reject(
          new DatasetLoadError(
            `Error loading database ${datasetPath}: ${errorMessage(error)}`,
            { cause: error }
          )
        );

      fs.createReadStream(datasetPath)
        .on("error", fail)
        .pipe(csv({ headers: false }))
        .on("data", (row: Record<string, string>) => {
          stats.totalRows++;

          const decision = parseDatasetRow(rowToFields(row));
          if (decision.kind === "skip") {
            stats.skipped[decision.reason]++;
            return;
          }

          records.push(decision.record);
          stats.loaded++;
        })
        .on("end", () => {
          resolve({ records, stats });
        })
        .on("error", fail);
    });
  }
}
