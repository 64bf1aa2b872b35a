import { BaseClient, type ClientConfig } from "./baseClient.js";
import {
  optimizationResponseSchema,
  type OptimizationRequestBody,
  type OptimizationResponse,
} from "./types.js";

export class OptimizationClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("optimization", config);
  }

  /** Solve a vehicle routing problem and return the optimized itinerary */
  public async optimize(
    body: OptimizationRequestBody,
  ): Promise<OptimizationResponse> {
    return this.client.post(optimizationResponseSchema, { body });
  }
}
