import axios, { type AxiosRequestConfig } from "axios";
import type { z } from "zod";
import { OrsApiError, toOrsApiError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://api.openrouteservice.org";

export interface ClientConfig {
  /** Base URL for the routing service (e.g., "https://api.openrouteservice.org") */
  baseUrl: string;
  /** API key sent in the Authorization header */
  apiKey: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;
  protected apiKey: string;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
    this.apiKey = config.apiKey;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(): AxiosRequestConfig {
    return {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json, application/geo+json",
        Authorization: this.apiKey,
      },
    };
  }

  /** Validate a response body against its schema, failing with the offending fields */
  protected parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    path: string,
    data: unknown,
  ): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new OrsApiError(`Unexpected response from ${path}: ${issues}`, null);
    }
    return result.data;
  }

  public async post<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: RequestParams = {},
  ): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig();
    let data: unknown;
    try {
      const response = await axios.post<unknown>(path, params.body, config);
      data = response.data;
    } catch (err) {
      throw toOrsApiError(err);
    }
    return this.parse(schema, path, data);
  }
}
