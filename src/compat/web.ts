import type { HttpResponse } from "../response.js";

export interface WebResponsePair {
  response: Response;
  clone: Response;
}

/** Statuses for which the Response constructor rejects a body */
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/**
 * Convert an HttpResponse into a standard Web Response.
 * Note: Do not call HttpResponse.text/json/bytes before converting.
 */
export function toWebResponse(response: HttpResponse): Response;
export function toWebResponse(response: HttpResponse, options: { tee: true }): WebResponsePair;
export function toWebResponse(
  response: HttpResponse,
  options?: { tee?: boolean },
): Response | WebResponsePair {
  if (response.bodyUsed || response.body.locked) {
    throw new Error("Cannot convert to Web Response: body stream is already locked/consumed");
  }

  // Appending keeps repeated headers (e.g. set-cookie) as separate values
  const headers = new Headers();
  for (const [name, value] of response.headers) {
    headers.append(name, value);
  }

  const init = {
    status: response.status,
    statusText: response.statusText,
    headers,
  };

  if (NULL_BODY_STATUSES.has(response.status)) {
    void response.body.cancel();
    return options?.tee
      ? { response: new Response(null, init), clone: new Response(null, init) }
      : new Response(null, init);
  }

  if (options?.tee) {
    const [a, b] = response.body.tee();
    return {
      response: new Response(a, init),
      clone: new Response(b, init),
    };
  }

  return new Response(response.body, init);
}
