/**
 * Transport Module - Service Layer
 *
 * Side effects happen here: one HTTP GET per command against the device's
 * remote-admin endpoint. Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { TransportError } from "./errors.js";
import {
  commandError,
  formatTransportError,
  invalidResponse,
  networkError,
  timeout,
  transportError,
} from "./errors.js";
import type {
  CommandParams,
  CommandResponse,
  TransportTarget,
} from "./schema.js";
import {
  buildCommandUrl,
  extractCommandError,
  isBinaryContentType,
  parseJsonBody,
} from "./transform.js";

const log = createLogger("transport");

/**
 * Sends commands to a single device.
 *
 * The target host can be rebound at runtime (the device may move to a new
 * DHCP lease); every request after `setHost` goes to the new address.
 */
export class CommandTransport {
  private currentHost: string;

  constructor(private readonly target: TransportTarget) {
    this.currentHost = target.host;
  }

  /**
   * Host the next request will be sent to.
   */
  get host(): string {
    return this.currentHost;
  }

  get port(): number {
    return this.target.port;
  }

  setHost(host: string): void {
    this.currentHost = host;
  }

  /**
   * Execute one command.
   *
   * @param command - Fully Kiosk command name (`cmd` query parameter)
   * @param password - Remote-admin password
   * @param params - Named parameters; null/undefined values are omitted
   */
  async execute(
    command: string,
    password: string,
    params: CommandParams = {},
  ): Promise<Result<CommandResponse, TransportError>> {
    const startTime = Date.now();
    const url = buildCommandUrl(
      {
        host: this.currentHost,
        port: this.target.port,
        useSsl: this.target.useSsl,
      },
      command,
      password,
      params,
    );

    logOperationStart(log, command, {
      host: this.currentHost,
      port: this.target.port,
      params: Object.keys(params),
    });

    const result = await this.send(command, url);

    if (result.isErr()) {
      logOperationFailed(log, command, formatTransportError(result.error), {
        host: this.currentHost,
      });
    } else {
      logOperationComplete(log, command, startTime, {
        kind: result.value.kind,
      });
    }

    return result;
  }

  private async send(
    command: string,
    url: URL,
  ): Promise<Result<CommandResponse, TransportError>> {
    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.target.timeoutMs),
      });

      return await this.decode(command, response);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));

      if (cause.name === "TimeoutError" || cause.name === "AbortError") {
        return err(timeout(command, this.target.timeoutMs));
      }

      return err(networkError("Failed to reach Fully Kiosk device", cause));
    }
  }

  private async decode(
    command: string,
    response: Response,
  ): Promise<Result<CommandResponse, TransportError>> {
    if (!response.ok) {
      const body = await response.text();
      log.warn(
        { command, statusCode: response.status },
        "Invalid response from Fully Kiosk Browser API",
      );
      return err(transportError(response.status, body));
    }

    const contentType = response.headers.get("content-type");

    if (isBinaryContentType(contentType)) {
      const buffer = await response.arrayBuffer();
      const image: CommandResponse = {
        kind: "binary",
        contentType: contentType ?? "application/octet-stream",
        data: new Uint8Array(buffer),
      };
      return ok(image);
    }

    const parsed = parseJsonBody(await response.text());
    if (parsed.isErr()) {
      return err(invalidResponse(command, `Body is not JSON: ${parsed.error}`));
    }

    const failure = extractCommandError(parsed.value);
    if (failure) {
      return err(commandError(command, failure.status, failure.statusText));
    }

    const decoded: CommandResponse = { kind: "json", data: parsed.value };
    return ok(decoded);
  }
}
