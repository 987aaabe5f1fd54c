import { AppConfig } from "./config";
import { CliUsageError } from "./services/errors";
import { RelayLookupOptions } from "./services/relay-lookup-service";

export type ParsedCommand =
  | { kind: "help" }
  | { kind: "run"; options: RelayLookupOptions };

export const USAGE = [
  "Usage: relay-geo <output.csv> [options]",
  "",
  "Resolve relay URLs (one per line) to latitude/longitude.",
  "",
  "Options:",
  "  --input, -i <file>        Input file with relay URLs (default: stdin)",
  "  --db <path>               Path to the DB-IP city IPv4 CSV",
  "  --concurrency, -c <n>     Maximum simultaneous DNS lookups (0 = unlimited)",
  "  --timeout <ms>            Per-hostname DNS timeout (0 = none)",
  "  --verbose, -v             Report relays that could not be located",
  "  --help, -h                Show this message",
  "",
  "Example:",
  "  relay-geo relays_geo.csv --input relays.txt",
].join("\n");

function parseCount(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new CliUsageError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse command line arguments (without the node and script entries).
 * Flags override the values from config.
 *
 * @throws CliUsageError on unknown flags, missing values or a missing output path
 */
export function parseCliArgs(
  argv: ReadonlyArray<string>,
  config: AppConfig
): ParsedCommand {
  const options: Omit<RelayLookupOptions, "outputFile"> = {
    datasetPath: config.datasetPath,
    concurrency: config.resolveConcurrency,
    timeoutMs: config.resolveTimeoutMs,
    verbose: config.verbose,
  };
  let outputFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    const takeValue = (): string => {
      const value = argv[++i];
      if (value === undefined) {
        throw new CliUsageError(`${arg} requires a value`);
      }
      return value;
    };

    switch (arg) {
      case "--help":
      case "-h":
        return { kind: "help" };
      case "--verbose":
      case "-v":
        options.verbose = true;
        break;
      case "--db":
        options.datasetPath = takeValue();
        break;
      case "--input":
      case "-i":
        options.inputFile = takeValue();
        break;
      case "--concurrency":
      case "-c":
        options.concurrency = parseCount(arg, takeValue());
        break;
      case "--timeout":
        options.timeoutMs = parseCount(arg, takeValue());
        break;
      default:
        if (arg.startsWith("-")) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        if (outputFile !== undefined) {
          throw new CliUsageError(`Unexpected argument: ${arg}`);
        }
        outputFile = arg;
    }
  }

  if (!outputFile) {
    throw new CliUsageError("Missing required output file");
  }

  return { kind: "run", options: { ...options, outputFile } };
}
