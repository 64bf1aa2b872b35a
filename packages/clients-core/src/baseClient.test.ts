import { describe, it, expect } from "vitest";
import { z } from "zod";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { OrsApiError } from "./errors.js";

// Expose protected methods for testing via a thin subclass
class TestClient extends BaseClient {
  constructor(resource: string, config: ClientConfig) {
    super(resource, config);
  }
  public exposedBuildPath(params: { path?: string }) {
    return this.buildPath(params);
  }
  public exposedBuildConfig() {
    return this.buildConfig();
  }
  public exposedParse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown) {
    return this.parse(schema, "/optimization", data);
  }
}

const config: ClientConfig = {
  baseUrl: "https://ors.example.test",
  apiKey: "test-key",
};

describe("BaseClient", () => {
  describe("buildPath", () => {
    it("returns resource root when no sub-path", () => {
      const client = new TestClient("optimization", config);
      expect(client.exposedBuildPath({})).toBe("/optimization");
    });

    it("appends sub-path to resource", () => {
      const client = new TestClient("v2/directions", config);
      expect(client.exposedBuildPath({ path: "driving-car/geojson" })).toBe(
        "/v2/directions/driving-car/geojson",
      );
    });
  });

  describe("buildConfig", () => {
    it("sets baseURL and default timeout", () => {
      const client = new TestClient("optimization", config);
      const axiosConfig = client.exposedBuildConfig();
      expect(axiosConfig.baseURL).toBe("https://ors.example.test");
      expect(axiosConfig.timeout).toBe(30000);
    });

    it("uses custom timeout when provided", () => {
      const client = new TestClient("optimization", { ...config, timeout: 5000 });
      const axiosConfig = client.exposedBuildConfig();
      expect(axiosConfig.timeout).toBe(5000);
    });

    it("sends the API key as the raw Authorization header", () => {
      const client = new TestClient("optimization", config);
      const axiosConfig = client.exposedBuildConfig();
      expect(axiosConfig.headers).toMatchObject({
        "Content-Type": "application/json",
        Authorization: "test-key",
      });
    });
  });

  describe("parse", () => {
    const schema = z.object({ code: z.number() });

    it("returns the validated body", () => {
      const client = new TestClient("optimization", config);
      expect(client.exposedParse(schema, { code: 0 })).toEqual({ code: 0 });
    });

    it("throws OrsApiError naming the offending field", () => {
      const client = new TestClient("optimization", config);
      expect(() => client.exposedParse(schema, { code: "zero" })).toThrow(OrsApiError);
      expect(() => client.exposedParse(schema, { code: "zero" })).toThrow(
        /^Unexpected response from \/optimization: code: /,
      );
    });
  });
});
