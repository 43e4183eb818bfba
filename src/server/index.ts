import { loadConfig } from "../config.js";
import { configureLogging, getLog } from "../utils/logger.js";
import { createApp } from "./app.js";

function getArgValue(argv: readonly string[], name: string): string | undefined {
  // supports: --name value  OR  --name=value
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;

    if (a === name) {
      return i + 1 < argv.length ? argv[i + 1] : undefined;
    }
    if (a.startsWith(name + "=")) {
      return a.slice(name.length + 1);
    }
  }
  return undefined;
}

async function main() {
  const argv = process.argv.slice(2);
  const portArg = getArgValue(argv, "--port");
  const config = loadConfig(portArg === undefined ? process.env : { ...process.env, PORT: portArg });

  configureLogging({ level: config.logLevel, pretty: config.logPretty });
  const log = getLog("QueryService");

  const app = createApp(config);
  await new Promise<void>((resolve, reject) => {
    const server = app.listen(config.port, () => {
      log.info("query service listening", { port: config.port });
      resolve();
    });
    server.on("error", reject);
  });
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
