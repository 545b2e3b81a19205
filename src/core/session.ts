import { AuthError, HttpError } from "./errors.js";
import { buildLandingUrl, buildLoginUrl, originOf } from "./link.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Chrome/117.0.5938.150 Safari/605.1.15";

const MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
// The login form's password field; still present means we are not in.
const LOGIN_FORM_MARKER = /<input[^>]*\bname=["']?ps\b/i;
const LOGIN_FAILURE_MARKER =
  /\b(invalid|incorrect|wrong)\s+(user\s*name|username|password|login|credentials)\b/i;

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Cookie-carrying HTTP client shared by every request of a run. Redirects
 * are followed by hand so cookies set on intermediate hops are kept.
 */
export class ArchiveSession {
  private readonly cookies = new Map<string, string>();

  constructor(readonly userAgent: string = DEFAULT_USER_AGENT) {}

  get(url: string, options: RequestOptions = {}): Promise<Response> {
    return this.send(url, "GET", undefined, options);
  }

  postForm(
    url: string,
    fields: Record<string, string>,
    options: RequestOptions = {},
  ): Promise<Response> {
    return this.send(url, "POST", new URLSearchParams(fields), options);
  }

  cookieHeader(): string {
    return [...this.cookies.entries()]
      .map(([name, value]) => `${name}=${value}`)
      .join("; ");
  }

  private async send(
    url: string,
    method: "GET" | "POST",
    body: URLSearchParams | undefined,
    options: RequestOptions,
  ): Promise<Response> {
    const signal =
      options.timeoutMs !== undefined
        ? AbortSignal.timeout(options.timeoutMs)
        : undefined;
    let current = url;
    let currentMethod = method;
    let currentBody = body;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop += 1) {
      const headers: Record<string, string> = {
        "User-Agent": this.userAgent,
        ...options.headers,
      };
      const cookie = this.cookieHeader();
      if (cookie) {
        headers.Cookie = cookie;
      }

      let response: Response;
      try {
        response = await fetch(current, {
          method: currentMethod,
          body: currentBody,
          headers,
          redirect: "manual",
          signal,
        });
      } catch (error) {
        throw new HttpError(
          `${currentMethod} ${current} failed: ${describeFailure(error)}`,
          current,
          undefined,
          { cause: error },
        );
      }

      this.storeCookies(response);
      const location = response.headers.get("location");
      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        return response;
      }
      await response.body?.cancel();
      const switchToGet =
        response.status === 303 ||
        ((response.status === 301 || response.status === 302) &&
          currentMethod === "POST");
      if (switchToGet) {
        currentMethod = "GET";
        currentBody = undefined;
      }
      current = new URL(location, current).toString();
    }
    throw new HttpError(`Too many redirects starting at ${url}`, url);
  }

  private storeCookies(response: Response): void {
    for (const line of response.headers.getSetCookie()) {
      const [pair, ...attributes] = line.split(";");
      const eq = pair.indexOf("=");
      if (eq <= 0) {
        continue;
      }
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      const expired = attributes.some((attr) =>
        /^\s*max-age\s*=\s*0\s*$/i.test(attr),
      );
      if (value === "" || expired) {
        this.cookies.delete(name);
      } else {
        this.cookies.set(name, value);
      }
    }
  }
}

export interface AuthenticateOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Logs in once and returns the session every later request must reuse.
 */
export async function authenticate(
  baseUrl: string,
  username: string,
  password: string,
  options: AuthenticateOptions = {},
): Promise<ArchiveSession> {
  const session = new ArchiveSession(options.userAgent);
  const { timeoutMs } = options;
  const loginUrl = buildLoginUrl(baseUrl);

  try {
    await readOk(await session.get(loginUrl, { timeoutMs }), "login form");
    const loginBody = await readOk(
      await session.postForm(
        baseUrl,
        { pp: "1", pn: username, ps: password },
        {
          headers: { Referer: loginUrl, Origin: originOf(baseUrl) },
          timeoutMs,
        },
      ),
      "login",
    );
    if (LOGIN_FAILURE_MARKER.test(loginBody)) {
      throw new AuthError("Login rejected: the archive reported invalid credentials.");
    }
    const landing = await readOk(
      await session.get(buildLandingUrl(baseUrl), { timeoutMs }),
      "landing page",
    );
    if (LOGIN_FORM_MARKER.test(landing)) {
      throw new AuthError("Login rejected: the archive still shows the login form.");
    }
  } catch (error) {
    if (error instanceof AuthError) {
      throw error;
    }
    throw new AuthError(`Login failed: ${describeFailure(error)}`, {
      cause: error,
    });
  }
  return session;
}

async function readOk(response: Response, step: string): Promise<string> {
  const body = await response.text();
  if (!response.ok) {
    throw new AuthError(`${step} request failed: ${response.status}`);
  }
  return body;
}

export function describeFailure(error: unknown): string {
  // AbortSignal.timeout rejects with a DOMException named TimeoutError.
  if (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "TimeoutError"
  ) {
    return "request timed out";
  }
  return error instanceof Error ? error.message : String(error);
}
