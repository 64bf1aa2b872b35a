import { describe, it, expect } from "vitest";
import {
  AxiosError,
  AxiosHeaders,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import { OrsApiError, extractServiceMessage, toOrsApiError } from "./errors.js";

function makeResponse(status: number, data: unknown): AxiosResponse {
  const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
  return { data, status, statusText: "", headers: {}, config };
}

describe("extractServiceMessage", () => {
  it("reads the optimization error string", () => {
    expect(
      extractServiceMessage({ code: 3, error: "Unfound route(s) from location [1,2]" }),
    ).toBe("Unfound route(s) from location [1,2]");
  });

  it("reads the nested directions error message", () => {
    expect(
      extractServiceMessage({ error: { code: 2010, message: "Could not find routable point" } }),
    ).toBe("Could not find routable point");
  });

  it("reads a top-level message", () => {
    expect(extractServiceMessage({ message: "Quota exceeded" })).toBe("Quota exceeded");
  });

  it("returns plain-text bodies as-is", () => {
    expect(extractServiceMessage("Bad Gateway")).toBe("Bad Gateway");
  });

  it("returns null for unrecognised bodies", () => {
    expect(extractServiceMessage({ status: "nope" })).toBeNull();
    expect(extractServiceMessage("   ")).toBeNull();
    expect(extractServiceMessage(undefined)).toBeNull();
  });
});

describe("toOrsApiError", () => {
  it("uses the service message and status of an HTTP error", () => {
    const axiosErr = new AxiosError(
      "Request failed with status code 500",
      "ERR_BAD_RESPONSE",
      undefined,
      undefined,
      makeResponse(500, { code: 3, error: "Unfound route(s) from location [30.1,-1.5]" }),
    );
    const err = toOrsApiError(axiosErr);
    expect(err).toBeInstanceOf(OrsApiError);
    expect(err.message).toBe("Unfound route(s) from location [30.1,-1.5]");
    expect(err.status).toBe(500);
    expect(err.cause).toBe(axiosErr);
  });

  it("falls back to the axios message when the body is unrecognised", () => {
    const axiosErr = new AxiosError(
      "Request failed with status code 403",
      "ERR_BAD_REQUEST",
      undefined,
      undefined,
      makeResponse(403, {}),
    );
    const err = toOrsApiError(axiosErr);
    expect(err.message).toBe("Request failed with status code 403");
    expect(err.status).toBe(403);
  });

  it("has no status when no response arrived", () => {
    const err = toOrsApiError(new AxiosError("timeout of 30000ms exceeded", "ECONNABORTED"));
    expect(err.message).toBe("timeout of 30000ms exceeded");
    expect(err.status).toBeNull();
  });

  it("wraps plain errors and passes OrsApiError through", () => {
    expect(toOrsApiError(new Error("boom")).message).toBe("boom");
    const original = new OrsApiError("already translated", 400);
    expect(toOrsApiError(original)).toBe(original);
  });
});
