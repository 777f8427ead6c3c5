/**
 * Transport Module - Schemas and Types
 *
 * Shapes of a Fully Kiosk REST request and its decoded response.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Request
// =============================================================================

/**
 * Where commands are sent. The host is mutable on the transport itself
 * (it follows the device's reported IP); everything else is fixed.
 */
export type TransportTarget = Readonly<{
  host: string;
  port: number;
  useSsl: boolean;
  timeoutMs: number;
}>;

/**
 * Named command parameters. `null` and `undefined` values are not sent.
 */
export type CommandParams = Readonly<
  Record<string, string | number | boolean | null | undefined>
>;

/**
 * Output-type marker sent with every request.
 */
export const RESPONSE_TYPE = "json";

// =============================================================================
// Response
// =============================================================================

/**
 * Literal `status` value Fully Kiosk uses to report a failed command.
 */
export const ERROR_STATUS = "Error";

/**
 * Status envelope present on command acknowledgements.
 */
export const CommandStatusSchema = z.object({
  status: z.string(),
  statustext: z.string().optional(),
});

export type CommandStatus = z.infer<typeof CommandStatusSchema>;

/**
 * Decoded response: a JSON document, or raw bytes for image commands.
 */
export type CommandResponse =
  | Readonly<{ kind: "json"; data: unknown }>
  | Readonly<{ kind: "binary"; contentType: string; data: Uint8Array }>;
