import { Agent, fetch } from "undici";

const BASE64_MIN_LENGTH = 200;
const BASE64_PATTERN = /^[A-Za-z0-9+/=\s]+$/;
const PDF_MAGIC = "%PDF";

interface RemoteResponseLike {
  status: number;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

type RemoteFetch = (
  url: string,
  init: { method: "GET"; headers: Record<string, string>; signal: AbortSignal; dispatcher?: Agent },
) => Promise<RemoteResponseLike>;

export interface RemoteDocumentFetcherOptions {
  timeoutMs: number;
  ignoreHttpsErrors: boolean;
  referer?: string;
  fetchFn?: RemoteFetch;
}

/** Depth-first search for the first long base64-looking string in a JSON value. */
export function findBase64Payload(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > BASE64_MIN_LENGTH && BASE64_PATTERN.test(trimmed) ? trimmed : undefined;
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findBase64Payload(item);
      if (found) {
        return found;
      }
    }
    return undefined;
  }
  if (value !== null && typeof value === "object") {
    for (const item of Object.values(value)) {
      const found = findBase64Payload(item);
      if (found) {
        return found;
      }
    }
  }
  return undefined;
}

/**
 * Turns a document endpoint's response body into PDF bytes. The endpoint
 * may answer with the PDF itself or with JSON wrapping it as base64.
 */
export function decodeDocumentPayload(contentType: string, body: Buffer): Buffer | undefined {
  const type = contentType.toLowerCase();
  if (type.includes("application/pdf") || body.subarray(0, PDF_MAGIC.length).toString("latin1") === PDF_MAGIC) {
    return body.length > 0 ? body : undefined;
  }

  if (!type.includes("json")) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf-8"));
  } catch {
    return undefined;
  }

  const encoded = findBase64Payload(parsed);
  if (!encoded) {
    return undefined;
  }
  const decoded = Buffer.from(encoded.replace(/\s+/g, ""), "base64");
  return decoded.length > 0 ? decoded : undefined;
}

export class RemoteDocumentFetcher {
  private readonly timeoutMs: number;
  // Only set when TLS verification is off; owned and closed by this fetcher.
  private readonly dispatcher?: Agent;
  private readonly referer?: string;
  private readonly fetchFn: RemoteFetch;

  constructor(options: RemoteDocumentFetcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.dispatcher = options.ignoreHttpsErrors
      ? new Agent({ connect: { rejectUnauthorized: false } })
      : undefined;
    this.referer = options.referer;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  /** Resolves undefined for non-200 answers and bodies that hold no document. */
  async fetchDocument(url: string): Promise<Buffer | undefined> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const headers: Record<string, string> = { accept: "application/pdf,application/json;q=0.9,*/*;q=0.5" };
    if (this.referer) {
      headers.referer = this.referer;
    }

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      if (response.status !== 200) {
        return undefined;
      }
      const body = Buffer.from(await response.arrayBuffer());
      return decodeDocumentPayload(response.headers.get("content-type") ?? "", body);
    } finally {
      clearTimeout(timeout);
    }
  }

  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}
