import type { Request, Response } from "express";
import type { HealthResponse } from "../models/responses.js";

export class HealthController {
  /** Liveness check */
  public getHealth(): HealthResponse {
    return {
      status: "ok",
      uptime: process.uptime(),
    };
  }

  /** GET /api/health */
  public handle = (_req: Request, res: Response): void => {
    res.json(this.getHealth());
  };
}
