import { Router, type Request, type Response } from "express";
import type { CatalogStore } from "../storage/types";
import { Errors } from "../utils/apiError";

export function handleHealth(catalog: CatalogStore, uptime: () => number = process.uptime) {
  return async (req: Request, res: Response) => {
    try {
      const songs = await catalog.all();
      return res.json({
        status: "ok",
        songs: songs.length,
        uptimeSeconds: Math.floor(uptime()),
      });
    } catch (error) {
      req.log.error("[Health] Catalog unavailable", { error });
      return Errors.internal(res, "Catalog unavailable.");
    }
  };
}

export function createHealthRouter(catalog: CatalogStore): Router {
  const router = Router();
  router.get("/", handleHealth(catalog));
  return router;
}
