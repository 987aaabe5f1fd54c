import express from "express";
import { createGeoRoutes } from "./controllers/geo-controller";
import { IntervalIndex } from "./services/interval-index";
import { ResolutionPipeline } from "./services/resolution-pipeline";

export function createApp(
  index: IntervalIndex,
  pipeline: ResolutionPipeline
): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Routes
  app.use("/api/geo", createGeoRoutes(index, pipeline));

  // Health check endpoint
  app.get("/health", (req, res) => {
    res.status(200).json({ status: "UP", ranges: index.size });
  });

  // Error handling middleware
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      console.error(err.stack);
      res.status(500).json({ error: "Internal Server Error" });
    }
  );

  return app;
}
