import axios from "axios";
import { z } from "zod";

/**
 * Failure reported by the routing service, or a transport failure on the way
 * to it. `message` is the service's own error text when it sent one.
 */
export class OrsApiError extends Error {
  /** HTTP status, or null when no response was received */
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrsApiError";
    this.status = status;
  }
}

// Optimization errors are `{ code, error: "..." }`,
// directions errors are `{ error: { code, message } }`.
const errorBodySchema = z.union([
  z.object({ error: z.string() }),
  z.object({ error: z.object({ message: z.string() }) }),
  z.object({ message: z.string() }),
]);

/** Pull the human-readable message out of an error response body */
export function extractServiceMessage(data: unknown): string | null {
  if (typeof data === "string") {
    return data.trim() === "" ? null : data;
  }
  const parsed = errorBodySchema.safeParse(data);
  if (!parsed.success) return null;
  const body = parsed.data;
  if ("message" in body) return body.message;
  return typeof body.error === "string" ? body.error : body.error.message;
}

/** Translate whatever axios threw into an OrsApiError */
export function toOrsApiError(err: unknown): OrsApiError {
  if (err instanceof OrsApiError) return err;

  if (axios.isAxiosError(err)) {
    const response = err.response;
    if (response) {
      const message = extractServiceMessage(response.data) ?? err.message;
      return new OrsApiError(message, response.status, { cause: err });
    }
    return new OrsApiError(err.message, null, { cause: err });
  }

  if (err instanceof Error) {
    return new OrsApiError(err.message, null, { cause: err });
  }
  return new OrsApiError(String(err), null, { cause: err });
}
