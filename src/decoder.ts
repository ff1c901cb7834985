/**
 * Response body decoding.
 *
 * The Content-Encoding header selects one decoder per listed coding; a list
 * is undone in reverse order of declaration. Nothing is built until the
 * first pull, so a body that is never read never reports a decode error.
 */
import { Duplex } from "node:stream";
import { DecompressionStream, type ReadableWritablePair } from "node:stream/web";
import zlib from "node:zlib";
import { BodyError, HttpClientError, errorMessage } from "./errors.js";
import type { HeaderMap } from "./utils/headers.js";

export type ContentCoding = "identity" | "gzip" | "deflate" | "br";

/** Value for Accept-Encoding when decompression is enabled */
export const ACCEPT_ENCODING = "gzip, deflate, br";

const CODING_ALIASES: Readonly<Record<string, ContentCoding>> = {
  identity: "identity",
  gzip: "gzip",
  "x-gzip": "gzip",
  deflate: "deflate",
  br: "br",
};

/**
 * Parse a Content-Encoding value into the codings to undo, outermost first.
 * Returns null when a coding is unknown: such bodies are passed through as-is.
 */
export function parseContentEncoding(value: string | null): ContentCoding[] | null {
  if (value === null) return [];
  const codings: ContentCoding[] = [];
  for (const token of value.split(",")) {
    const name = token.trim().toLowerCase();
    if (!name) continue;
    const coding = CODING_ALIASES[name];
    if (coding === undefined) return null;
    if (coding !== "identity") codings.push(coding);
  }
  return codings.reverse();
}

function decoderFor(coding: Exclude<ContentCoding, "identity">): ReadableWritablePair<Uint8Array, Uint8Array> {
  switch (coding) {
    case "gzip":
    case "deflate":
      return new DecompressionStream(coding);
    case "br":
      return Duplex.toWeb(zlib.createBrotliDecompress());
  }
}

function isPassThroughError(err: unknown): boolean {
  return (
    err instanceof HttpClientError ||
    !(err instanceof Error) ||
    err.name === "AbortError" ||
    err.name === "TimeoutError"
  );
}

/**
 * Wrap a raw body with lazy decoders. `codings` lists the decoders to apply
 * in order (as returned by parseContentEncoding).
 */
export function decodeBody(
  raw: ReadableStream<Uint8Array>,
  codings: readonly ContentCoding[],
  url: string,
): ReadableStream<Uint8Array> {
  const steps = codings.filter(
    (c): c is Exclude<ContentCoding, "identity"> => c !== "identity",
  );
  if (steps.length === 0) return raw;

  let reader: ReadableStreamDefaultReader<Uint8Array> | null = null;
  const label = steps.join(", ");

  return new ReadableStream<Uint8Array>(
    {
      async pull(controller) {
        if (!reader) {
          let stream = raw;
          for (const coding of steps) stream = stream.pipeThrough(decoderFor(coding));
          reader = stream.getReader();
        }
        try {
          const { done, value } = await reader.read();
          if (done) {
            controller.close();
            return;
          }
          controller.enqueue(value);
        } catch (err) {
          controller.error(
            isPassThroughError(err)
              ? err
              : new BodyError(`Failed to decode ${label} body: ${errorMessage(err)}`, {
                  url,
                  cause: err,
                }),
          );
        }
      },
      cancel(reason) {
        return reader ? reader.cancel(reason) : raw.cancel(reason);
      },
    },
    { highWaterMark: 0 },
  );
}

/**
 * Attach decoding to a response body according to its headers.
 * When decoding applies, Content-Encoding and Content-Length are removed
 * from `headers`, since they describe the encoded bytes.
 */
export function attachDecoder(
  headers: HeaderMap,
  body: ReadableStream<Uint8Array>,
  options: { url: string; hasBody: boolean },
): ReadableStream<Uint8Array> {
  if (!options.hasBody) return body;
  const codings = parseContentEncoding(headers.get("content-encoding"));
  if (codings === null || codings.length === 0) return body;
  headers.delete("content-encoding");
  headers.delete("content-length");
  return decodeBody(body, codings, options.url);
}
