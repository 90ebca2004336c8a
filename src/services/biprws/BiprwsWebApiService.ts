import { BiprwsConfig } from "../../types/biprws.js";
import { logger } from "../../utils/logger.js";
import {
  AuthError,
  BiprwsApiError,
  NotFoundError,
  ParseError,
  TransportError,
} from "./errors.js";

export const LOGON_TOKEN_HEADER = "X-SAP-LogonToken";

type HttpMethod = "GET" | "POST";

export interface JsonRequestOptions {
  method?: HttpMethod;
  token?: string;
  body?: unknown;
}

/**
 * Build the header set for one request. A fresh object every call, so the
 * JSON and XML phases of a scan never share state.
 */
export function buildHeaders(
  format: "json" | "xml",
  token?: string,
): Record<string, string> {
  const mediaType = format === "json" ? "application/json" : "text/xml";
  const headers: Record<string, string> = {
    Accept: mediaType,
    "Content-Type": mediaType,
  };
  if (token !== undefined) {
    headers[LOGON_TOKEN_HEADER] = token;
  }
  return headers;
}

/**
 * Service class for interacting with the BIPRWS REST API.
 * Handles HTTP requests and maps failures onto the BiprwsError taxonomy.
 */
export class BiprwsWebApiService {
  private config: BiprwsConfig;
  private baseUrl: string;

  constructor(config: BiprwsConfig) {
    this.config = { ...config };
    this.baseUrl = config.url.replace(/\/+$/, "");
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Send a JSON request and return the parsed body
   * (undefined when the response has no body).
   */
  async sendJson(
    path: string,
    options: JsonRequestOptions = {},
  ): Promise<unknown> {
    const method = options.method ?? "GET";
    const text = await this.send(path, {
      method,
      headers: buildHeaders("json", options.token),
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });

    if (text.trim() === "") {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ParseError(`Response from ${method} ${path} is not valid JSON`, {
        cause: error,
      });
    }
  }

  /**
   * GET an XML document and return it as text
   */
  async sendXml(path: string, token: string): Promise<string> {
    return this.send(path, {
      method: "GET",
      headers: buildHeaders("xml", token),
    });
  }

  /**
   * Send one request and read its whole body. A failure while connecting or
   * while reading the body, including a timeout, becomes a TransportError.
   */
  private async send(path: string, init: RequestInit): Promise<string> {
    const url = `${this.baseUrl}${path}`;
    const method = init.method ?? "GET";
    const options: RequestInit = { ...init };
    if (this.config.timeoutInSeconds !== undefined) {
      options.signal = AbortSignal.timeout(this.config.timeoutInSeconds * 1000);
    }

    logger.debug(`${method} ${url}`);

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(url, options);
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      logger.exception("BIPRWS request did not complete", error, {
        component: "BiprwsWebApiService",
        operation: "send",
        method,
        path,
      });
      throw new TransportError(`${method} ${url} failed: ${describe(error)}`, {
        cause: error,
      });
    }

    if (!ok) {
      throw mapStatusError(status, text, `${method} ${path}`);
    }

    return text;
  }
}

function mapStatusError(
  status: number,
  body: string,
  request: string,
): Error {
  if (status === 401 || status === 403) {
    return new AuthError(
      `${request} was refused with status ${status}: ${body}`,
    );
  }
  if (status === 404) {
    return new NotFoundError(`${request} returned 404: ${body}`);
  }
  return new BiprwsApiError(status, body);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
