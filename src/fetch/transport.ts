import { writeBinary } from "../utils/fs";
import { errorMessage } from "../utils/errors";

export type TransportFailureKind = "not_found" | "unreachable" | "failed";

export interface TransportFailure {
  ok: false;
  kind: TransportFailureKind;
  status: number | null;
  message: string;
}

export type TransportResult<T> = { ok: true; value: T } | TransportFailure;

export interface DownloadedFile {
  path: string;
  bytes: number;
}

/**
 * HTTP collaborator. Implementations report failures through the result
 * variant instead of throwing.
 */
export interface HttpTransport {
  getText(url: string): Promise<TransportResult<string>>;
  download(url: string, destPath: string): Promise<TransportResult<DownloadedFile>>;
}

const UNREACHABLE_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT"
]);

function readCode(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value && typeof value.code === "string") {
    return value.code;
  }
  return undefined;
}

export function classifyRequestError(error: unknown): TransportFailure {
  const code = readCode(error) ?? (error instanceof Error ? readCode(error.cause) : undefined);
  const message = code ? `${errorMessage(error)} (${code})` : errorMessage(error);
  return {
    ok: false,
    kind: code && UNREACHABLE_CODES.has(code) ? "unreachable" : "failed",
    status: null,
    message
  };
}

export function classifyResponseStatus(status: number, statusText: string): TransportFailure {
  return {
    ok: false,
    kind: status === 404 ? "not_found" : "failed",
    status,
    message: `HTTP ${status}${statusText ? ` ${statusText}` : ""}`
  };
}

export interface FetchTransportConfig {
  timeoutMs?: number;
  userAgent?: string;
}

export class FetchTransport implements HttpTransport {
  private timeoutMs: number;
  private userAgent: string;

  constructor(config: FetchTransportConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 60000;
    this.userAgent = config.userAgent ?? "tzdb-updater";
  }

  async getText(url: string): Promise<TransportResult<string>> {
    try {
      const response = await this.request(url);
      if (!response.ok) {
        return classifyResponseStatus(response.status, response.statusText);
      }
      return { ok: true, value: await response.text() };
    } catch (error) {
      return classifyRequestError(error);
    }
  }

  async download(url: string, destPath: string): Promise<TransportResult<DownloadedFile>> {
    try {
      const response = await this.request(url);
      if (!response.ok) {
        return classifyResponseStatus(response.status, response.statusText);
      }
      const buffer = Buffer.from(await response.arrayBuffer());
      await writeBinary(destPath, buffer);
      return { ok: true, value: { path: destPath, bytes: buffer.length } };
    } catch (error) {
      return classifyRequestError(error);
    }
  }

  private request(url: string): Promise<Response> {
    return fetch(url, {
      headers: { "User-Agent": this.userAgent },
      signal: AbortSignal.timeout(this.timeoutMs)
    });
  }
}
