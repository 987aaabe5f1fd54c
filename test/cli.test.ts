import fs from "fs";
import os from "os";
import path from "path";
import { main } from "../src/cli";
import { USAGE } from "../src/cli-options";
import { AppConfig } from "../src/config";
import { DatasetAcquirer, DatasetLoader } from "../src/services/dataset-loader";
import { DatasetAcquisitionError } from "../src/services/errors";
import { HostResolver } from "../src/services/resolution-pipeline";

class FailingAcquirer implements DatasetAcquirer {
  async download(): Promise<void> {
    throw new DatasetAcquisitionError("Error setting up database: offline");
  }
}

class NoAnswerResolver implements HostResolver {
  async resolveIpv4(hostname: string): Promise<string[]> {
    throw new Error(`getaddrinfo ENOTFOUND ${hostname}`);
  }
}

describe("relay-geo exit status", () => {
  let tmpDir: string;
  let config: AppConfig;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-geo-cli-"));
    config = {
      datasetPath: path.join(tmpDir, "dataset.csv"),
      datasetUrl: "https://example.invalid/dataset.csv.gz",
      resolveConcurrency: 50,
      resolveTimeoutMs: 0,
      port: 3001,
      verbose: false,
    };
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test("should return 1 when the dataset cannot be acquired", async () => {
    const outputFile = path.join(tmpDir, "out.csv");

    const code = await main([outputFile], {
      config,
      loader: new DatasetLoader(new FailingAcquirer()),
    });

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Error setting up database: offline");
    expect(fs.existsSync(outputFile)).toBe(false);
  });

  test("should return 1 and print usage when the output path is missing", async () => {
    const code = await main([], { config });

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Missing required output file");
    expect(errorSpy).toHaveBeenCalledWith(USAGE);
  });

  test("should return 0 when nothing was located", async () => {
    fs.writeFileSync(
      config.datasetPath,
      "16777216,16777471,AS,JP,Tokyo,,Tokyo,35.6895,139.6917\n"
    );
    const inputFile = path.join(tmpDir, "relays.txt");
    fs.writeFileSync(inputFile, "wss://gone.example.com\n");
    const outputFile = path.join(tmpDir, "out.csv");

    const code = await main([outputFile, "--input", inputFile], {
      config,
      loader: new DatasetLoader(new FailingAcquirer()),
      resolver: new NoAnswerResolver(),
    });

    expect(code).toBe(0);
    expect(fs.readFileSync(outputFile, "utf-8")).toBe(
      "Relay URL,Latitude,Longitude\n"
    );
  });

  test("should return 0 for --help", async () => {
    await expect(main(["--help"], { config })).resolves.toBe(0);
  });
});
