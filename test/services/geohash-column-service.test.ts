import fs from "fs";
import os from "os";
import path from "path";
import { addGeohashColumn } from "../../src/services/geohash-column-service";

describe("addGeohashColumn", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-geo-geohash-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeInput(contents: string): string {
    const inputPath = path.join(tmpDir, "relays.csv");
    fs.writeFileSync(inputPath, contents);
    return inputPath;
  }

  test("should append a geohash to every row", async () => {
    const inputPath = writeInput(
      "Relay URL,Latitude,Longitude\n" +
        "wss://a.example.com,0,0\n" +
        "wss://b.example.com,57.64911,10.40744\n"
    );
    const outputPath = path.join(tmpDir, "out.csv");

    await expect(addGeohashColumn(inputPath, outputPath, 5)).resolves.toBe(2);

    expect(fs.readFileSync(outputPath, "utf-8")).toBe(
      "Relay URL,Latitude,Longitude,Geohash\n" +
        "wss://a.example.com,0,0,s0000\n" +
        "wss://b.example.com,57.64911,10.40744,u4pru\n"
    );
  });

  test("should leave the geohash empty when coordinates do not parse", async () => {
    const inputPath = writeInput(
      "Relay URL,Latitude,Longitude\nwss://a.example.com,,\nwss://b.example.com,north,0\n"
    );
    const outputPath = path.join(tmpDir, "out.csv");

    await addGeohashColumn(inputPath, outputPath, 5);

    expect(fs.readFileSync(outputPath, "utf-8")).toBe(
      "Relay URL,Latitude,Longitude,Geohash\n" +
        "wss://a.example.com,,,\n" +
        "wss://b.example.com,north,0,\n"
    );
  });

  test("should replace an existing geohash column", async () => {
    const inputPath = writeInput(
      "Relay URL,Latitude,Longitude,Geohash\nwss://a.example.com,0,0,stale\n"
    );
    const outputPath = path.join(tmpDir, "out.csv");

    await addGeohashColumn(inputPath, outputPath, 3);

    expect(fs.readFileSync(outputPath, "utf-8")).toBe(
      "Relay URL,Latitude,Longitude,Geohash\nwss://a.example.com,0,0,s00\n"
    );
  });

  test("should carry every existing column through", async () => {
    const inputPath = writeInput(
      "Relay URL,Latitude,Longitude,Country\nwss://a.example.com,0,0,JP\n"
    );
    const outputPath = path.join(tmpDir, "out.csv");

    await addGeohashColumn(inputPath, outputPath, 2);

    expect(fs.readFileSync(outputPath, "utf-8")).toBe(
      "Relay URL,Latitude,Longitude,Country,Geohash\nwss://a.example.com,0,0,JP,s0\n"
    );
  });

  test("should reject a file without coordinate columns", async () => {
    const inputPath = writeInput("Relay URL,Lat,Lon\nwss://a.example.com,0,0\n");

    await expect(
      addGeohashColumn(inputPath, path.join(tmpDir, "out.csv"))
    ).rejects.toThrow("Input CSV must contain Latitude and Longitude columns");
  });
});
