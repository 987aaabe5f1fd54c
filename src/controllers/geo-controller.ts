import { Router, Request, Response } from "express";
import { isLocated } from "../models/geo-data";
import { IntervalIndex } from "../services/interval-index";
import { IpUtil } from "../services/ip-util";
import { ResolutionPipeline } from "../services/resolution-pipeline";

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === "string")
  );
}

export function createGeoRoutes(
  index: IntervalIndex,
  pipeline: ResolutionPipeline
): Router {
  const geoRoutes = Router();

  // GET /api/geo?ip=x.x.x.x
  geoRoutes.get("/", (req: Request, res: Response) => {
    const ip = req.query.ip;

    if (!ip) {
      res.status(400).json({
        error: "Missing required query parameter: ip",
      });
      return;
    }

    if (typeof ip !== "string" || !IpUtil.isValidIpv4(ip)) {
      res.status(400).json({
        error: "Invalid IPv4 address format",
      });
      return;
    }

    const ipNumeric = IpUtil.parseIpv4(ip);
    const location = index.lookup(ipNumeric);

    if (!location) {
      res.status(404).json({
        message: "No geolocation data found for the provided IP address",
        ip,
      });
      return;
    }

    res.status(200).json({ ip, ipNumeric, ...location });
  });

  // GET /api/geo/endpoint?url=wss://relay.example.com
  geoRoutes.get("/endpoint", async (req: Request, res: Response) => {
    try {
      const url = req.query.url;

      if (typeof url !== "string" || !url) {
        res.status(400).json({
          error: "Missing required query parameter: url",
        });
        return;
      }

      const outcome = await pipeline.resolveAndLocate(url);

      if (!isLocated(outcome)) {
        res.status(404).json({
          message: "No geolocation data found for the provided endpoint",
          endpoint: url,
        });
        return;
      }

      res.status(200).json({
        endpoint: outcome.endpoint,
        latitude: outcome.latitude,
        longitude: outcome.longitude,
      });
    } catch (error) {
      console.error("Error processing endpoint lookup:", error);
      res
        .status(500)
        .json({ error: "Failed to process geolocation request" });
    }
  });

  // POST /api/geo/endpoints { "endpoints": ["wss://...", ...] }
  geoRoutes.post("/endpoints", async (req: Request, res: Response) => {
    try {
      const endpoints: unknown = req.body?.endpoints;

      if (!isStringArray(endpoints)) {
        res.status(400).json({
          error: "Request body must contain an endpoints array of strings",
        });
        return;
      }

      const outcomes = await pipeline.run(endpoints);
      const results = outcomes.filter(isLocated).map((outcome) => ({
        endpoint: outcome.endpoint,
        latitude: outcome.latitude,
        longitude: outcome.longitude,
      }));

      res.status(200).json({
        total: endpoints.length,
        located: results.length,
        results,
      });
    } catch (error) {
      console.error("Error processing batch lookup:", error);
      res
        .status(500)
        .json({ error: "Failed to process geolocation request" });
    }
  });

  return geoRoutes;
}
