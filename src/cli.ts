#!/usr/bin/env node
import { Command } from "commander";
import { ZodError } from "zod";
import { loadConfig } from "./config/load";
import { Config, LogLevelSchema } from "./config/types";
import { ChannelClosedError } from "./errors";
import { createLogger, flushAndExit } from "./logger";
import { runNode } from "./main";
import { parseSocketAddress } from "./net/address";

interface StartOptions {
  config?: string;
  connect?: string[];
  logLevel?: string;
  human?: boolean;
}

const program = new Command();

program.name("floodnet").description("Peer-to-peer message flooding node");

program
  .command("start")
  .description("Run a node and read commands from stdin")
  .argument("[listen]", "Address to listen on, ip:port")
  .option("--config <path>", "JSON config file")
  .option("--connect <address...>", "Peers to dial on startup")
  .option("--log-level <level>", "debug, info, warn, error or silent")
  .option("--human", "Pretty-print log lines")
  .action(async (listen: string | undefined, options: StartOptions) => {
    let config: Config;
    try {
      config = await loadConfig(options.config);
      if (listen) {
        const { host, port } = parseSocketAddress(listen);
        config.node.host = host;
        config.node.port = port;
      }
      if (options.connect) {
        config.node.peers = [...config.node.peers, ...options.connect];
      }
      if (options.logLevel) {
        config.observability.logLevel = LogLevelSchema.parse(options.logLevel);
      }
      if (options.human) {
        config.observability.logHuman = true;
      }
    } catch (err) {
      console.error("Invalid configuration:", describe(err));
      process.exit(1);
    }

    const logger = createLogger(config.observability);
    try {
      await runNode(config, logger);
    } catch (err) {
      if (err instanceof ChannelClosedError) {
        logger.fatal({ event: "producer_died", channel: err.channel }, err.message);
      } else {
        logger.fatal({ event: "fatal", err }, "Node stopped unexpectedly");
      }
      flushAndExit(logger, 1);
    }
  });

program
  .command("validate-config")
  .requiredOption("--config <path>", "JSON config file")
  .action(async (options: { config: string }) => {
    try {
      await loadConfig(options.config);
      console.log("Config is valid.");
    } catch (err) {
      console.error("Validation failed:", describe(err));
      process.exit(1);
    }
  });

function describe(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
