import fs from "fs";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import zlib from "zlib";
import { DatasetAcquisitionError, errorMessage } from "./errors";

export type FetchLike = typeof fetch;

/**
 * Fetches the compressed IP range dataset and unpacks it to a local file
 */
export class DatasetDownloader {
  constructor(
    private readonly url: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  /**
   * Download the archive beside targetPath, gunzip it into targetPath and
   * remove the archive.
   *
   * @throws DatasetAcquisitionError when any step fails
   */
  async download(targetPath: string): Promise<void> {
    const archivePath = `${targetPath}.gz`;

    console.log(`Database not found at ${targetPath}. Downloading...`);
    try {
      await this.fetchArchive(archivePath);

      console.log("Extracting database...");
      await pipeline(
        fs.createReadStream(archivePath),
        zlib.createGunzip(),
        fs.createWriteStream(targetPath)
      );
    } catch (error) {
      await fs.promises.rm(targetPath, { force: true });
      throw new DatasetAcquisitionError(
        `Error setting up database: ${errorMessage(error)}`,
        { cause: error }
      );
    } finally {
      await fs.promises.rm(archivePath, { force: true });
    }

    console.log("Database ready.");
  }

  private async fetchArchive(archivePath: string): Promise<void> {
    const response = await this.fetchImpl(this.url);
    if (!response.ok) {
      throw new Error(
        `GET ${this.url} responded ${response.status} ${response.statusText}`
      );
    }

    if (!response.body) {
      throw new Error(`GET ${this.url} returned an empty body`);
    }

    await pipeline(
      Readable.fromWeb(response.body),
      fs.createWriteStream(archivePath)
    );
  }
}
