import { describe, it, expect } from "vitest";
import { toWebResponse } from "../../../src/compat/web.js";
import { createResponse, type HttpResponse } from "../../../src/response.js";
import { HeaderMap, type HeadersInit } from "../../../src/utils/headers.js";

function bodyOf(text: string): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      if (text) controller.enqueue(new TextEncoder().encode(text));
      controller.close();
    },
  });
}

function httpResponse(
  status: number,
  statusText: string,
  headers: HeadersInit = {},
  body = "",
): HttpResponse {
  return createResponse({
    status,
    statusText,
    httpVersion: "1.1",
    headers: new HeaderMap(headers),
    url: "http://example.com/",
    chain: ["http://example.com/"],
    body: bodyOf(body),
  });
}

describe("toWebResponse", () => {
  it("converts status, headers and body", async () => {
    const web = toWebResponse(
      httpResponse(201, "Created", { "Content-Type": "text/plain" }, "test body"),
    );

    expect(web).toBeInstanceOf(Response);
    expect(web.status).toBe(201);
    expect(web.statusText).toBe("Created");
    expect(web.headers.get("content-type")).toBe("text/plain");
    expect(await web.text()).toBe("test body");
  });

  it("keeps repeated Set-Cookie headers apart", () => {
    const web = toWebResponse(
      httpResponse(200, "OK", [
        ["Set-Cookie", "a=1"],
        ["Set-Cookie", "b=2"],
        ["X-Custom", "value"],
      ]),
    );

    expect(web.headers.getSetCookie()).toEqual(["a=1", "b=2"]);
    expect(web.headers.get("x-custom")).toBe("value");
  });

  it("drops the body for null-body statuses", async () => {
    const web = toWebResponse(httpResponse(204, "No Content"));
    expect(web.body).toBeNull();
    expect(await web.text()).toBe("");
  });

  it("tees the body into two readable responses", async () => {
    const { response, clone } = toWebResponse(httpResponse(200, "OK", {}, "twice"), { tee: true });
    expect(await response.text()).toBe("twice");
    expect(await clone.text()).toBe("twice");
  });

  it("refuses a response whose body was already read", async () => {
    const res = httpResponse(200, "OK", {}, "gone");
    await res.text();
    expect(() => toWebResponse(res)).toThrow(
      "Cannot convert to Web Response: body stream is already locked/consumed",
    );
  });
});
