import { isLocated } from "../models/geo-data";
import { DatasetLoader } from "./dataset-loader";
import { HostResolver, ResolutionPipeline } from "./resolution-pipeline";
import {
  readEndpointsFromFile,
  readEndpointsFromStdin,
  writeResultsCsv,
} from "./relay-io";

export interface RelayLookupOptions {
  outputFile: string;
  datasetPath: string;
  /** Read endpoints from this file instead of standard input */
  inputFile?: string;
  concurrency: number;
  timeoutMs: number;
  verbose: boolean;
}

export interface RelayLookupDeps {
  loader: DatasetLoader;
  resolver?: HostResolver;
  stdin?: NodeJS.ReadableStream & { isTTY?: boolean };
}

export interface RelayLookupSummary {
  total: number;
  located: number;
  outputFile: string;
}

/**
 * One complete run: load the dataset, read the endpoints, locate them and
 * write the results CSV.
 *
 * Dataset errors propagate to the caller; per-endpoint failures only reduce
 * the located count.
 */
export async function runRelayLookup(
  options: RelayLookupOptions,
  deps: RelayLookupDeps
): Promise<RelayLookupSummary> {
  const { index } = await deps.loader.load(options.datasetPath);

  const endpoints = options.inputFile
    ? await readEndpointsFromFile(options.inputFile)
    : await readEndpointsFromStdin(deps.stdin);

  if (endpoints.length === 0) {
    console.log("No URLs provided via input file or stdin.");
  } else {
    console.log(`Processing ${endpoints.length} relays...`);
  }

  const pipeline = new ResolutionPipeline(index, deps.resolver, {
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs,
    verbose: options.verbose,
  });
  const outcomes = await pipeline.run(endpoints);

  for (const outcome of outcomes) {
    if (isLocated(outcome)) {
      console.log(
        `${outcome.endpoint}: latitude=${outcome.latitude}, longitude=${outcome.longitude}`
      );
    }
  }

  const located = await writeResultsCsv(options.outputFile, outcomes);

  console.log(`Results written to ${options.outputFile}`);
  console.log(`Successfully resolved ${located}/${endpoints.length} relays.`);

  return { total: endpoints.length, located, outputFile: options.outputFile };
}
