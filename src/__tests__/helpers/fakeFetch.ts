export type FakeRequest = {
  url: URL;
  method: string;
  body: unknown;
};

export type Route = (req: FakeRequest) => Response | Promise<Response>;

/** In-process stand-in for the network, handed to the OpenAI client through its `fetch` option. */
export function createFakeFetch(route: Route) {
  const calls: FakeRequest[] = [];
  const fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const href = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    const req: FakeRequest = { url: new URL(href), method: init?.method ?? "GET", body };
    calls.push(req);
    return route(req);
  };
  return { fetch, calls };
}

export function jsonResponse(status: number, data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function errorResponse(status: number, message: string): Response {
  return jsonResponse(status, { error: { message, type: "invalid_request_error", code: null, param: null } });
}
