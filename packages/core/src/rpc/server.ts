import { Server, type ChannelOptions } from "@grpc/grpc-js";
import type { Logger } from "tslog";
import type { ServerConfig, ServiceConfig } from "../config/types.js";
import { createConfiguredLogger } from "../infra/logger.js";
import { formatListenAddress, isLoopbackAddress, resolveBindHost } from "./net.js";
import { loadConnect4Service } from "./protocol/definition.js";
import {
  createConnect4ServiceImplementation,
  withRawRequests,
  type Connect4ServiceHandlers,
} from "./server-grpc.js";
import { createConnectHandler } from "./server-methods/connect.js";
import { buildServerCredentials } from "./tls.js";

/**
 * Server bootstrap: ties together the loaded contract, handlers,
 * credentials and the bind address.
 */

export interface Connect4ServerInstance {
  server: Server;
  logger: Logger<unknown>;
  /** Bind and start serving. Resolves to the bound port. */
  listen(): Promise<number>;
  close(): Promise<void>;
}

export interface Connect4ServerOptions {
  config: ServiceConfig;
  handlers?: Partial<Connect4ServiceHandlers>;
  protoRoot?: string;
}

export function buildChannelOptions(server: ServerConfig): ChannelOptions {
  const options: ChannelOptions = {};
  if (server.maxConcurrentStreams !== undefined) {
    options["grpc.max_concurrent_streams"] = server.maxConcurrentStreams;
  }
  if (server.maxReceiveMessageBytes !== undefined) {
    options["grpc.max_receive_message_length"] = server.maxReceiveMessageBytes;
  }
  return options;
}

export function createConnect4Server(
  options: Connect4ServerOptions,
): Connect4ServerInstance {
  const { config } = options;
  const serverConfig = config.server;

  const logger = createConfiguredLogger("connect4", config.logging);

  const definition = loadConnect4Service(options.protoRoot);
  const handlers: Connect4ServiceHandlers = {
    connect: options.handlers?.connect ?? createConnectHandler({ logger }),
  };

  const server = new Server(buildChannelOptions(serverConfig));
  server.addService(
    withRawRequests(definition.service),
    createConnect4ServiceImplementation({ definition, handlers, logger }),
  );

  const host = resolveBindHost(serverConfig.bind, serverConfig.host);
  const tlsEnabled = serverConfig.tls?.enabled === true;
  let listening = false;

  async function listen(): Promise<number> {
    const credentials = buildServerCredentials(serverConfig.tls);
    if (!tlsEnabled && !isLoopbackAddress(host)) {
      logger.warn(
        `Serving plaintext on non-loopback address ${host}. Enable server.tls for untrusted networks.`,
      );
    }

    const port = await new Promise<number>((resolve, reject) => {
      server.bindAsync(
        formatListenAddress(host, serverConfig.port),
        credentials,
        (err, boundPort) => {
          if (err) reject(err);
          else resolve(boundPort);
        },
      );
    });

    listening = true;
    logger.info(
      `Connect4Service listening on ${formatListenAddress(host, port)}${tlsEnabled ? " (TLS)" : ""}`,
    );
    return port;
  }

  async function close(): Promise<void> {
    if (!listening) {
      server.forceShutdown();
      return;
    }
    listening = false;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        logger.warn(
          `Graceful shutdown exceeded ${serverConfig.shutdownGraceMs}ms, forcing`,
        );
        server.forceShutdown();
        resolve();
      }, serverConfig.shutdownGraceMs);
      timer.unref();

      server.tryShutdown((err) => {
        clearTimeout(timer);
        if (err) {
          logger.warn(`Graceful shutdown failed: ${err.message}`);
          server.forceShutdown();
        }
        resolve();
      });
    });
    logger.info("Connect4Service stopped");
  }

  return { server, logger, listen, close };
}
