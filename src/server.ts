import { createApp } from "./app";
import { loadConfig } from "./config";
import { DatasetDownloader } from "./services/dataset-downloader";
import { DatasetLoader } from "./services/dataset-loader";
import { ResolutionPipeline } from "./services/resolution-pipeline";

async function start(): Promise<void> {
  const config = loadConfig();

  const loader = new DatasetLoader(new DatasetDownloader(config.datasetUrl));
  const { index } = await loader.load(config.datasetPath);

  const pipeline = new ResolutionPipeline(index, undefined, {
    concurrency: config.resolveConcurrency,
    timeoutMs: config.resolveTimeoutMs,
    verbose: config.verbose,
  });
  const app = createApp(index, pipeline);

  const server = app.listen(config.port, () => {
    console.log(`Server is running on port ${config.port}`);
    console.log(`API endpoints:`);
    console.log(`- GET http://localhost:${config.port}/api/geo?ip={ip_address}`);
    console.log(
      `- GET http://localhost:${config.port}/api/geo/endpoint?url={relay_url}`
    );
    console.log(`- POST http://localhost:${config.port}/api/geo/endpoints`);
    console.log(`- GET http://localhost:${config.port}/health`);
  });

  // Clean shutdown function
  const shutdown = () => {
    console.log("Shutting down gracefully...");
    server.close((err) => {
      if (err) {
        console.error("Error during shutdown:", err);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  // Listen for termination signals to close connections
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

start().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
