/**
 * Canned fetch responses
 */

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status: number): Response {
  return new Response(text, { status });
}

/** URL and init of the nth fetch call */
export function fetchCall(spy: jest.SpyInstance, n: number): { url: string; init: RequestInit } {
  const [input, init] = spy.mock.calls[n];
  return { url: String(input), init: init ?? {} };
}

export function headerOf(init: RequestInit, name: string): string | undefined {
  return new Headers(init.headers).get(name) ?? undefined;
}
