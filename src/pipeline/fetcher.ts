import { Agent, fetch } from "undici";
import type { Dispatcher } from "undici";
import type { Logger } from "pino";

export type FetchResult =
  | { success: true; body: Buffer; charset: string | null; url: string }
  | { success: false; error: string; url: string };

export type FetchOptions = {
  readonly userAgent: string;
  readonly timeoutMs: number;
  readonly verifyTls: boolean;
};

const CHARSET_PATTERN = /charset\s*=\s*["']?([^;"'\s]+)/i;

let insecureAgent: Agent | null = null;

/** The charset parameter of a Content-Type header, if it names one. */
export function charsetFrom(contentType: string | null): string | null {
  const match = contentType ? CHARSET_PATTERN.exec(contentType) : null;
  return match?.[1] ?? null;
}

function dispatcherFor(verifyTls: boolean): Dispatcher | undefined {
  if (verifyTls) {
    return undefined;
  }
  if (!insecureAgent) {
    insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
  }
  return insecureAgent;
}

/**
 * Fetches article HTML from a single URL in one attempt. The body is
 * returned undecoded along with the header charset, since German pages
 * are not always UTF-8.
 * With `verifyTls` off the request accepts any server certificate.
 */
export async function fetchArticle(
  url: string,
  options: FetchOptions,
  logger: Logger,
): Promise<FetchResult> {
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/html,application/xhtml+xml",
      },
      dispatcher: dispatcherFor(options.verifyTls),
    });

    if (!response.ok) {
      await response.body?.cancel();
      return {
        success: false,
        error: `HTTP ${response.status}: ${response.statusText}`,
        url,
      };
    }

    const body = Buffer.from(await response.arrayBuffer());
    return {
      success: true,
      body,
      charset: charsetFrom(response.headers.get("content-type")),
      url,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ url, error: message }, "article fetch failed");
    return { success: false, error: message, url };
  }
}
