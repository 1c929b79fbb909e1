import { startQueryServer } from "../../server/query-server";
import type { CommandDefinition } from "./types";

export const serveCommand: CommandDefinition = {
  name: "serve",
  description: "Start the HTTP query server",
  run: async (args, { config, runtime, logger }) => {
    const server = await startQueryServer({
      runtime,
      host: args.host ?? config.server.host,
      port: args.port ?? config.server.port,
      logger
    });

    const shutdown = () => {
      runtime.dispose();
      server.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error("http.stop.failed", {
            data: { message: error instanceof Error ? error.message : String(error) }
          });
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    return {
      success: true,
      message: `Listening on ${server.url}`,
      data: { url: server.url, port: server.port },
      exitCode: null
    };
  }
};
