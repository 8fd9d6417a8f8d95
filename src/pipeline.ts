import { Writable } from "node:stream";
import { VERSION, loadConfig } from "./config.js";
import { Failure, Outcome, describeFailure, errorMessage, malformed, succeed } from "./errors.js";
import { debug, error as logError, info } from "./logger.js";
import { normalizePayload } from "./normalize.js";
import { DEFAULT_LIMITS, ReadLimits, readRequest } from "./request.js";
import { resolveJob } from "./resolver.js";
import { ACCEPTED, BridgeResponse, responseForFailure, textResponse, writeResponse } from "./response.js";
import { createRouteTable, matchRoute } from "./routes.js";
import { emitJob } from "./spool.js";
import { BridgeConfig, IncomingRequest, JsonValue, PayloadShape } from "./types.js";

export interface PipelineOptions {
  readonly configPath: string;
  readonly limits?: ReadLimits;
  readonly now?: () => Date;
}

function decodeJson(body: Buffer): Outcome<JsonValue> {
  try {
    const parsed: JsonValue = JSON.parse(body.toString("utf8"));
    return succeed(parsed);
  } catch (cause) {
    return malformed(`body is not JSON: ${errorMessage(cause)}`);
  }
}

async function ingest(
  request: IncomingRequest,
  shape: PayloadShape,
  config: BridgeConfig,
  options: PipelineOptions
): Promise<Outcome<BridgeResponse>> {
  const payload = decodeJson(request.body);
  if (!payload.ok) {
    return payload;
  }
  const record = normalizePayload(shape, payload.value, config.settings);
  if (!record.ok) {
    return record;
  }
  const job = resolveJob(record.value, config.projects);
  if (!job.ok) {
    return job;
  }
  const written = await emitJob(job.value, config.settings, { now: options.now });
  if (!written.ok) {
    return written;
  }
  return succeed(ACCEPTED);
}

async function run(input: AsyncIterable<Buffer | string>, options: PipelineOptions): Promise<Outcome<BridgeResponse>> {
  const config = await loadConfig(options.configPath);
  if (!config.ok) {
    return config;
  }
  const request = await readRequest(input, options.limits ?? DEFAULT_LIMITS);
  if (!request.ok) {
    return request;
  }
  const { method, path } = request.value;
  const action = matchRoute(createRouteTable(config.value.settings.routes), method, path);
  if (!action.ok) {
    return action;
  }
  switch (action.value.kind) {
    case "version":
      return succeed(textResponse(200, VERSION));
    case "ingest":
      debug(`${method} ${path} handled as ${action.value.shape} payload.`);
      return ingest(request.value, action.value.shape, config.value, options);
  }
}

function logFailure(failure: Failure): void {
  const message = describeFailure(failure);
  if (failure.kind === "configuration-missing" || failure.kind === "configuration-invalid" || failure.kind === "write-failure") {
    logError(message);
  } else {
    info(`Rejected: ${message}`);
  }
}

/**
 * Run every stage for one connection and map the terminal outcome to a response.
 *
 * The configuration is loaded before any request byte is read, so a missing file is reported
 * even for requests that would fail to parse.
 *
 * @param input - Connection byte stream.
 * @param options - Configuration path, read limits and clock.
 * @returns Response for the connection.
 */
export async function processRequest(
  input: AsyncIterable<Buffer | string>,
  options: PipelineOptions
): Promise<BridgeResponse> {
  const outcome = await run(input, options);
  if (outcome.ok) {
    return outcome.value;
  }
  logFailure(outcome.failure);
  return responseForFailure(outcome.failure);
}

/**
 * Handle one connection end to end and always answer it.
 *
 * Anything thrown by a stage becomes the generic malformed-request response.
 *
 * @param input - Connection byte stream.
 * @param output - Connection write side.
 * @param options - Pipeline options.
 * @returns The response that was written.
 */
export async function handleConnection(
  input: AsyncIterable<Buffer | string>,
  output: Writable,
  options: PipelineOptions
): Promise<BridgeResponse> {
  let response: BridgeResponse;
  try {
    response = await processRequest(input, options);
  } catch (cause) {
    logError(`Request failed: ${errorMessage(cause)}`);
    response = responseForFailure({ kind: "malformed-request", reason: errorMessage(cause) });
  }
  await writeResponse(output, response);
  return response;
}
