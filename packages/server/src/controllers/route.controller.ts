import type { Request, Response, NextFunction } from "express";
import { computeRouteRequestSchema } from "../models/requests.js";
import type { ComputeRouteResponse } from "../models/responses.js";
import type { RoutePlanningService } from "../services/route-planning.service.js";

export class RouteController {
  private service: RoutePlanningService;

  constructor(service: RoutePlanningService) {
    this.service = service;
  }

  /** Compute the optimal route through the uploaded destinations */
  public async computeOptimal(body: unknown): Promise<ComputeRouteResponse> {
    const request = computeRouteRequestSchema.parse(body);
    return this.service.plan(request);
  }

  /** POST /api/routes/optimal */
  public handle = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await this.computeOptimal(req.body));
    } catch (err) {
      next(err);
    }
  };
}
