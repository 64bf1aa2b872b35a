import { BaseClient, type ClientConfig } from "./baseClient.js";
import {
  directionsResponseSchema,
  type DirectionsRequestBody,
  type DirectionsResponse,
} from "./types.js";

export class DirectionsClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("v2/directions", config);
  }

  /** Turn-by-turn route through the given coordinates, as GeoJSON */
  public async directions(
    profile: string,
    body: DirectionsRequestBody,
  ): Promise<DirectionsResponse> {
    return this.client.post(directionsResponseSchema, {
      path: profile + "/geojson",
      body,
    });
  }
}
