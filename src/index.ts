#!/usr/bin/env node
import { buildBridge } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { runBridge } from "./runtime/bridgeProcess";
import { parseCliArgs } from "./env";
import { loadConfig } from "./config";
import { ConsoleLogger } from "./adapters/sys/ConsoleLogger";

async function main() {
  const cli = parseCliArgs(process.argv.slice(2));
  const { config, path: configPath } = loadConfig(cli.configPath);

  const loggingHandle = initializeLogging(cli.logFile ?? config.logging.file);
  const logger = new ConsoleLogger({ level: cli.logLevel ?? config.logging.level, scope: "bridge" });
  if (loggingHandle.logPath) logger.info(`Logging output to ${loggingHandle.logPath}`);
  logger.info(configPath ? `Loaded config from ${configPath}` : "Using built-in configuration", {
    workspace: config.workspace.path,
  });

  const bridge = buildBridge(config, logger);

  const exit = (code: number) => {
    loggingHandle.shutdown();
    process.exit(code);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      logger.info(`Received ${signal}; exiting`);
      exit(0);
    });
  }
  process.on("exit", () => loggingHandle.shutdown());

  process.exitCode = await runBridge(
    bridge,
    cli,
    { stdin: process.stdin, stdout: process.stdout, exit },
    logger
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
