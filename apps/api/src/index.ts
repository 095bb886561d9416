import { buildApi } from "./app.js";
import { loadApiConfig } from "./config.js";
import { close } from "./db.js";

const config = loadApiConfig();
const app = await buildApi(config);

app.log.info({ mediaRoot: config.mediaRoot, bodyLimit: config.bodyLimit }, "api configured");

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await close();
  process.exit(1);
}

const shutdown = async () => {
  await app.close();
  await close();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
