import { ENV } from "./env.js";
import { Outcome, malformed, succeed } from "./errors.js";
import { debug } from "./logger.js";
import { IncomingRequest } from "./types.js";

const LINE_FEED = 0x0a;

/**
 * Byte limits applied while reading a request.
 */
export interface ReadLimits {
  readonly maxLineBytes: number;
  readonly maxBodyBytes: number;
}

export const DEFAULT_LIMITS: ReadLimits = {
  maxLineBytes: 8192,
  maxBodyBytes: ENV.MAX_BODY_BYTES
};

// Methods that may omit content-length; everything else must declare its body.
const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

class LineTooLongError extends Error {}

/**
 * Pull-based reader over an async chunk source, handing out lines and exact byte counts.
 */
class ByteReader {
  private buffered: Buffer = Buffer.alloc(0);
  private ended = false;
  private readonly iterator: AsyncIterator<Buffer | string>;

  constructor(source: AsyncIterable<Buffer | string>) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  private async fill(): Promise<boolean> {
    if (this.ended) {
      return false;
    }
    const next = await this.iterator.next();
    if (next.done) {
      this.ended = true;
      return false;
    }
    const chunk = typeof next.value === "string" ? Buffer.from(next.value, "utf8") : next.value;
    this.buffered = Buffer.concat([this.buffered, chunk]);
    return true;
  }

  /**
   * Read one line without its terminator (`\n` or `\r\n`).
   *
   * @returns The line, or undefined when the stream ends first.
   */
  async readLine(maxBytes: number): Promise<string | undefined> {
    for (;;) {
      const end = this.buffered.indexOf(LINE_FEED);
      if (end >= 0) {
        if (end > maxBytes) {
          throw new LineTooLongError();
        }
        const line = this.buffered.subarray(0, end).toString("utf8");
        this.buffered = this.buffered.subarray(end + 1);
        return line.endsWith("\r") ? line.slice(0, -1) : line;
      }
      if (this.buffered.length > maxBytes) {
        throw new LineTooLongError();
      }
      if (!(await this.fill())) {
        return undefined;
      }
    }
  }

  /**
   * Read exactly `count` bytes.
   *
   * @returns The bytes, or undefined when the stream ends short.
   */
  async readBytes(count: number): Promise<Buffer | undefined> {
    while (this.buffered.length < count) {
      if (!(await this.fill())) {
        return undefined;
      }
    }
    const bytes = this.buffered.subarray(0, count);
    this.buffered = this.buffered.subarray(count);
    return bytes;
  }

  async close(): Promise<void> {
    await this.iterator.return?.();
  }
}

/**
 * Split a request line into method, path and protocol version.
 */
function parseRequestLine(line: string): Outcome<Pick<IncomingRequest, "method" | "path" | "protocolVersion">> {
  const fields = line.trim().split(/\s+/);
  if (fields.length !== 3) {
    return malformed(`request line has ${fields.length} fields`);
  }
  const [method, path, protocolVersion] = fields;
  return succeed({ method, path, protocolVersion });
}

/**
 * Split a header line on its first colon.
 *
 * @returns Lower-cased trimmed name and trimmed value, or undefined for lines without a colon.
 */
export function parseHeaderLine(line: string): readonly [string, string] | undefined {
  const colon = line.indexOf(":");
  if (colon < 0) {
    return undefined;
  }
  return [line.slice(0, colon).trim().toLowerCase(), line.slice(colon + 1).trim()];
}

function declaredLength(
  method: string,
  headers: Readonly<Record<string, string>>,
  limits: ReadLimits
): Outcome<number> {
  const raw = headers["content-length"];
  if (raw === undefined) {
    return BODYLESS_METHODS.has(method) ? succeed(0) : malformed("content-length header missing");
  }
  if (!/^\d+$/.test(raw)) {
    return malformed(`content-length is not a number: ${raw}`);
  }
  const length = Number.parseInt(raw, 10);
  if (length > limits.maxBodyBytes) {
    return malformed(`content-length ${length} exceeds ${limits.maxBodyBytes} bytes`);
  }
  return succeed(length);
}

async function readFrom(reader: ByteReader, limits: ReadLimits): Promise<Outcome<IncomingRequest>> {
  let line = await reader.readLine(limits.maxLineBytes);
  while (line === "") {
    line = await reader.readLine(limits.maxLineBytes);
  }
  if (line === undefined) {
    return malformed("connection closed before request line");
  }
  const requestLine = parseRequestLine(line);
  if (!requestLine.ok) {
    return requestLine;
  }

  const headers: Record<string, string> = {};
  for (;;) {
    const headerLine = await reader.readLine(limits.maxLineBytes);
    if (headerLine === undefined) {
      return malformed("connection closed inside header block");
    }
    if (headerLine === "") {
      break;
    }
    const header = parseHeaderLine(headerLine);
    if (header) {
      headers[header[0]] = header[1];
    }
  }

  const length = declaredLength(requestLine.value.method, headers, limits);
  if (!length.ok) {
    return length;
  }
  const body = await reader.readBytes(length.value);
  if (!body) {
    return malformed(`body shorter than content-length ${length.value}`);
  }

  debug(`Read ${requestLine.value.method} ${requestLine.value.path} with ${body.length} body bytes.`);
  return succeed({ ...requestLine.value, headers, body });
}

/**
 * Read one HTTP/1.x request: request line, headers up to the first empty line, then exactly
 * `content-length` body bytes. No chunked encoding, no multipart.
 *
 * @param input - Connection byte stream.
 * @param limits - Line and body size limits.
 * @returns Parsed request or `malformed-request`.
 */
export async function readRequest(
  input: AsyncIterable<Buffer | string>,
  limits: ReadLimits = DEFAULT_LIMITS
): Promise<Outcome<IncomingRequest>> {
  const reader = new ByteReader(input);
  try {
    return await readFrom(reader, limits);
  } catch (cause) {
    if (cause instanceof LineTooLongError) {
      return malformed(`header line longer than ${limits.maxLineBytes} bytes`);
    }
    throw cause;
  } finally {
    await reader.close();
  }
}
