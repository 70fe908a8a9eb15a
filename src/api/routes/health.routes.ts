import express, { Request, Response } from "express";
import type { CareerAnalysisService } from "../../services/career-analysis.services";

export function createHealthRouter(analysis: CareerAnalysisService) {
  const router = express.Router();

  router.get("/health", (req: Request, res: Response) => {
    res.json({
      status: "ok",
      ai: analysis.isAiAvailable() ? "available" : "unavailable",
    });
  });

  return router;
}
