import { AppConfig, loadConfig } from "./config";
import { parseCliArgs, ParsedCommand, USAGE } from "./cli-options";
import { DatasetDownloader } from "./services/dataset-downloader";
import { DatasetLoader } from "./services/dataset-loader";
import { CliUsageError, RelayGeoError } from "./services/errors";
import { HostResolver } from "./services/resolution-pipeline";
import { runRelayLookup } from "./services/relay-lookup-service";

export interface CliDeps {
  config?: AppConfig;
  loader?: DatasetLoader;
  resolver?: HostResolver;
  stdin?: NodeJS.ReadableStream & { isTTY?: boolean };
}

/**
 * Run the relay-geo command and return its exit status: 1 on a usage error or
 * a dataset failure, 0 otherwise (even when nothing was located)
 */
export async function main(
  argv: ReadonlyArray<string>,
  deps: CliDeps = {}
): Promise<number> {
  const config = deps.config ?? loadConfig();

  let command: ParsedCommand;
  try {
    command = parseCliArgs(argv, config);
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error;
    console.error(error.message);
    console.error(USAGE);
    return 1;
  }

  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  const loader =
    deps.loader ?? new DatasetLoader(new DatasetDownloader(config.datasetUrl));

  try {
    await runRelayLookup(command.options, {
      loader,
      resolver: deps.resolver,
      stdin: deps.stdin,
    });
  } catch (error) {
    // Dataset acquisition and load failures end the run
    if (!(error instanceof RelayGeoError)) throw error;
    console.error(error.message);
    return 1;
  }

  return 0;
}
