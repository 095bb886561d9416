import { tmpdir } from "node:os";
import { buildApi } from "../../../src/app.js";

export const TEST_HOST = "foodgram.test";

export async function buildApiTestApp(mediaRoot = tmpdir()) {
  return buildApi(
    { port: 0, host: "127.0.0.1", mediaRoot, bodyLimit: 20 * 1024 * 1024 },
    { logger: false },
  );
}

export function authHeaders(token: string) {
  return { authorization: `Token ${token}`, host: TEST_HOST };
}
