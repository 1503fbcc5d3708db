#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";

const program = new Command();

function defaultConfigPath(): string {
  return process.env.CONNECT4_CONFIG ?? "connect4.json";
}

program
  .name("connect4")
  .description("Connect4Service gRPC server and client")
  .version("0.1.0");

// --- connect4 init ---
program
  .command("init")
  .description("Create a config file populated with defaults")
  .option("-c, --config <path>", "Path to config file")
  .action(async (options: { config?: string }) => {
    const { existsSync } = await import("node:fs");
    const { initializeConfig } = await import("./config/loader.js");

    const configPath = options.config ?? defaultConfigPath();
    if (existsSync(configPath)) {
      console.error(`Config file already exists: ${configPath}`);
      process.exit(1);
    }

    await initializeConfig(configPath);
    console.log(`Created ${configPath}`);
    console.log();
    console.log("Then start the server:");
    console.log("  connect4 start");
  });

// --- connect4 start ---
program
  .command("start")
  .description("Start the gRPC server")
  .option("-c, --config <path>", "Path to config file")
  .option("-p, --port <number>", "Override server port")
  .action(async (options: { config?: string; port?: string }) => {
    const { loadConfigOrDefaults } = await import("./config/loader.js");
    const { createConnect4Server } = await import("./rpc/server.js");
    const { createConfiguredLogger, createLogger } = await import(
      "./infra/logger.js"
    );

    let log = createLogger("connect4");

    try {
      const config = await loadConfigOrDefaults(
        options.config ?? defaultConfigPath(),
      );
      log = createConfiguredLogger("connect4", config.logging);

      if (options.port) {
        const port = Number.parseInt(options.port, 10);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          throw new Error(`Invalid port: ${options.port}`);
        }
        config.server.port = port;
      }

      const instance = createConnect4Server({ config });
      await instance.listen();

      const shutdown = () => {
        log.info("Shutting down...");
        instance.close().then(
          () => process.exit(0),
          (err: unknown) => {
            log.error("Shutdown failed:", err);
            process.exit(1);
          },
        );
      };

      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
    } catch (err) {
      log.error(
        `Failed to start: ${err instanceof Error ? err.message : String(err)}`,
      );
      process.exit(1);
    }
  });

// --- connect4 connect ---
program
  .command("connect")
  .description("Call Connect4Service.Connect and print the response")
  .requiredOption("--client-id <id>", "Client application id")
  .requiredOption("--account-id <id>", "Account id")
  .option("-c, --config <path>", "Path to config file")
  .option("-t, --target <host:port>", "Server address")
  .option("-d, --deadline <ms>", "Call deadline in milliseconds")
  .action(
    async (options: {
      clientId: string;
      accountId: string;
      config?: string;
      target?: string;
      deadline?: string;
    }) => {
      const { status } = await import("@grpc/grpc-js");
      const { loadConfigOrDefaults } = await import("./config/loader.js");
      const { createConnect4Client, isServiceError } = await import(
        "./rpc/client.js"
      );

      let deadlineMs: number | undefined;
      if (options.deadline !== undefined) {
        deadlineMs = Number.parseInt(options.deadline, 10);
        if (!Number.isInteger(deadlineMs) || deadlineMs <= 0) {
          console.error(`Invalid deadline: ${options.deadline}`);
          process.exitCode = 1;
          return;
        }
      }

      const config = await loadConfigOrDefaults(
        options.config ?? defaultConfigPath(),
      );
      const client = createConnect4Client({
        target: options.target ?? config.client.target,
        deadlineMs: deadlineMs ?? config.client.deadlineMs,
        tls: config.client.tls,
      });

      try {
        const response = await client.connect({
          metadata: { clientId: options.clientId, accountId: options.accountId },
        });
        console.log(JSON.stringify(response, null, 2));
      } catch (err) {
        if (isServiceError(err)) {
          console.error(`${status[err.code]}: ${err.details}`);
        } else {
          console.error(err instanceof Error ? err.message : String(err));
        }
        process.exitCode = 1;
      } finally {
        client.close();
      }
    },
  );

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
