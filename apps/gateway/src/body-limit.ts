import { Transform, type TransformCallback } from "node:stream";

export class PayloadTooLargeError extends Error {
  readonly statusCode = 413;

  constructor(readonly limit: number) {
    super(`Request body is larger than ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

export function declaredLength(header: string | string[] | undefined): number | null {
  const raw = Array.isArray(header) ? header[0] : header;
  if (raw === undefined) return null;
  const length = Number(raw);
  return Number.isFinite(length) && length >= 0 ? length : null;
}

/** Passes bytes through and fails the stream once more than `limit` bytes have gone by. */
export class BodyLimitStream extends Transform {
  receivedEncodedLength = 0;

  constructor(readonly limit: number) {
    super();
  }

  get exceeded(): boolean {
    return this.receivedEncodedLength > this.limit;
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
    this.receivedEncodedLength += chunk.length;
    if (this.receivedEncodedLength > this.limit) {
      callback(new PayloadTooLargeError(this.limit));
      return;
    }
    callback(null, chunk);
  }
}
