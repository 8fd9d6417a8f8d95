import { Writable } from "node:stream";
import { Failure, describeFailure } from "./errors.js";

/**
 * Status, extra headers and optional plain-text body for the single reply on a connection.
 */
export interface BridgeResponse {
  readonly status: number;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

const STATUS_TEXT: Readonly<Record<number, string>> = {
  200: "OK",
  204: "No Content",
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
  422: "Unprocessable Entity",
  500: "Internal Server Error"
};

export const ACCEPTED: BridgeResponse = { status: 204 };

export function textResponse(status: number, body: string): BridgeResponse {
  return { status, body };
}

/**
 * Map a failure to its response.
 *
 * Validation and resolution failures explain themselves; infrastructure failures are a bare
 * status so no paths or internal state reach the caller.
 *
 * @param failure - Terminal pipeline failure.
 * @returns Response to send.
 */
export function responseForFailure(failure: Failure): BridgeResponse {
  switch (failure.kind) {
    case "validation":
    case "unknown-project":
    case "unknown-target":
    case "unknown-task":
    case "ambiguous-target":
      return textResponse(422, describeFailure(failure));
    case "malformed-request":
      return { status: 400 };
    case "not-found":
      return { status: 404 };
    case "method-not-allowed":
      return { status: 405, headers: { Allow: failure.allowed.join(", ") } };
    case "configuration-missing":
    case "configuration-invalid":
    case "write-failure":
      return { status: 500 };
  }
}

/**
 * Render a response as HTTP/1.1 bytes. The connection is always closed afterwards.
 */
export function serializeResponse(response: BridgeResponse): string {
  const lines = [`HTTP/1.1 ${response.status} ${STATUS_TEXT[response.status] ?? "Unknown"}`, "Connection: close"];
  for (const [name, value] of Object.entries(response.headers ?? {})) {
    lines.push(`${name}: ${value}`);
  }
  if (response.body !== undefined) {
    lines.push("Content-Type: text/plain; charset=utf-8", `Content-Length: ${Buffer.byteLength(response.body, "utf8")}`);
  }
  return `${lines.join("\r\n")}\r\n\r\n${response.body ?? ""}`;
}

/**
 * Write the response and wait until it is flushed to the connection.
 */
export function writeResponse(output: Writable, response: BridgeResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(serializeResponse(response), "utf8", cause => {
      if (cause) {
        reject(cause);
      } else {
        resolve();
      }
    });
  });
}
