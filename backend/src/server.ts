import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { buildApp } from "./app.js";
import { loadConfig } from "./libs/config.js";

// Environment comes from .env.local/.env for local runs; everything is still read through process.env.
// DOTENV_CONFIG_PATH overrides the search.
const dotenvCandidates = [
  process.env.DOTENV_CONFIG_PATH,
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
  path.resolve(process.cwd(), "..", ".env.local"),
  path.resolve(process.cwd(), "..", ".env"),
].filter((p): p is string => Boolean(p));

const dotenvPath = dotenvCandidates.find((p) => fs.existsSync(p));
dotenv.config(dotenvPath ? { path: dotenvPath } : undefined);

async function main() {
  const config = loadConfig();
  const app = await buildApp({ config });
  // containers need 0.0.0.0 to be reachable
  await app.listen({ port: config.port, host: "0.0.0.0" });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
