export const BASE_URL = "http://bi.test:6405/biprws";

export interface RecordedRequest {
  url: string;
  method: string;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body?: string;
}

export type FetchHandler = (
  request: RecordedRequest
) => Response | Promise<Response>;

let handler: FetchHandler | null = null;

/** Every request seen by the fetch mock since the last reset, in order */
export const recordedRequests: RecordedRequest[] = [];

export function setFetchHandler(h: FetchHandler) {
  handler = h;
}

export function resetFetchMock() {
  handler = null;
  recordedRequests.length = 0;
}

/**
 * Stand-in for global fetch: records the request and hands it to the
 * current handler. Unexpected requests get a 404.
 */
export async function handleFetch(
  input: string | URL | Request,
  init?: RequestInit
): Promise<Response> {
  const url =
    typeof input === "string"
      ? input
      : input instanceof URL
      ? input.href
      : input.url;

  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });

  const request: RecordedRequest = {
    url,
    method: init?.method ?? "GET",
    headers,
    body: typeof init?.body === "string" ? init.body : undefined,
  };
  recordedRequests.push(request);

  if (!handler) {
    return jsonResponse(404, { message: "Not Found" });
  }
  return handler(request);
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function xmlResponse(status: number, body: string): Response {
  return new Response(body, {
    status,
    headers: { "Content-Type": "text/xml" },
  });
}

/**
 * A query specification whose single query returns the given result objects
 */
export function specificationXml(objectNames: string[]): string {
  const resultObjects = objectNames
    .map(
      (name, index) =>
        `        <resultObjects identifier="DP0.DO${index + 1}" name="${name}"/>`
    )
    .join("\n");
  return `<?xml version="1.0" encoding="UTF-8"?>
<queryspec:QuerySpec xmlns:queryspec="http://com.sap.sl.queryspec">
  <queryTree>
    <children>
      <query>
${resultObjects}
      </query>
    </children>
  </queryTree>
</queryspec:QuerySpec>`;
}

// Helpers to create common BIPRWS mock responses
export const createBiprwsResponse = {
  logon: (token = "test-logon-token") =>
    jsonResponse(200, { logonToken: token }),
  logoff: () => new Response("", { status: 200 }),
  document: (id: string, path: string, name: string) =>
    jsonResponse(200, {
      document: { id: Number(id), cuid: `cuid-${id}`, name, path, state: "Original" },
    }),
  dataProviders: (providers: Array<{ id: string; name: string }>) =>
    jsonResponse(200, {
      dataproviders: {
        dataprovider: providers.map((p) => ({ ...p, dataSourceType: "unx" })),
      },
    }),
  specification: (objectNames: string[]) =>
    xmlResponse(200, specificationXml(objectNames)),
  children: (entries: Array<{ id: string; type: string; name?: string }>) =>
    jsonResponse(200, {
      entries: entries.map((e) => ({ ...e, id: Number(e.id), cuid: `cuid-${e.id}` })),
    }),
  error: (status = 400, message = "Bad Request") =>
    jsonResponse(status, { error_code: "RWS 00000", message }),
};

export type Routes = Record<string, () => Response | Promise<Response>>;

/**
 * Answer requests by "METHOD /path" relative to BASE_URL; anything else
 * gets a 404.
 */
export function setRoutes(routes: Routes) {
  setFetchHandler((request) => {
    const path = request.url.startsWith(BASE_URL)
      ? request.url.slice(BASE_URL.length)
      : request.url;
    const route = routes[`${request.method} ${path}`];
    return route
      ? route()
      : jsonResponse(404, { message: `No route for ${request.method} ${path}` });
  });
}

/** Paths of the recorded requests, relative to BASE_URL */
export function requestedPaths(): string[] {
  return recordedRequests.map(
    (request) =>
      `${request.method} ${request.url.slice(BASE_URL.length)}`
  );
}
