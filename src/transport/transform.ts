/**
 * Transport Module - Pure Transformations
 *
 * Request building and response classification.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { CommandParams, TransportTarget } from "./schema.js";
import { CommandStatusSchema, ERROR_STATUS, RESPONSE_TYPE } from "./schema.js";

// =============================================================================
// Request Building
// =============================================================================

/**
 * Base URL of the device's remote-admin endpoint.
 */
export function buildBaseUrl(
  target: Pick<TransportTarget, "host" | "port" | "useSsl">,
): string {
  const scheme = target.useSsl ? "https" : "http";
  return `${scheme}://${target.host}:${target.port}/`;
}

/**
 * Build the ordered query parameters for a command.
 *
 * `cmd`, `password` and `type` come first; named parameters follow in
 * insertion order. Absent values are dropped, the rest are stringified.
 */
export function buildQueryParams(
  command: string,
  password: string,
  params: CommandParams = {},
): Array<[string, string]> {
  const query: Array<[string, string]> = [
    ["cmd", command],
    ["password", password],
    ["type", RESPONSE_TYPE],
  ];

  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    query.push([key, String(value)]);
  }

  return query;
}

/**
 * Full request URL for a command.
 */
export function buildCommandUrl(
  target: Pick<TransportTarget, "host" | "port" | "useSsl">,
  command: string,
  password: string,
  params: CommandParams = {},
): URL {
  const url = new URL(buildBaseUrl(target));
  for (const [key, value] of buildQueryParams(command, password, params)) {
    url.searchParams.append(key, value);
  }
  return url;
}

// =============================================================================
// Response Classification
// =============================================================================

/**
 * Image and octet-stream responses are returned as raw bytes.
 */
export function isBinaryContentType(contentType: string | null): boolean {
  if (!contentType) return false;

  const mediaType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return (
    mediaType.startsWith("image/") || mediaType === "application/octet-stream"
  );
}

/**
 * Extract the device-reported failure from a decoded JSON body.
 *
 * @returns status and text when `status` is the error marker, otherwise null
 */
export function extractCommandError(
  data: unknown,
): { status: string; statusText: string } | null {
  const parsed = CommandStatusSchema.safeParse(data);
  if (!parsed.success || parsed.data.status !== ERROR_STATUS) return null;

  return {
    status: parsed.data.status,
    statusText: parsed.data.statustext ?? "",
  };
}

/**
 * Parse a response body as JSON, whatever content type it was served with.
 * The device labels some JSON replies as text/html.
 *
 * @returns the decoded document, or the parser's message
 */
export function parseJsonBody(text: string): Result<unknown, string> {
  try {
    const data: unknown = JSON.parse(text);
    return ok(data);
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}
