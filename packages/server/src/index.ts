import { buildApp } from "./app.js";
import { loadConfig, validateConfig } from "./config.js";

async function main() {
  const config = loadConfig();

  // Validate config before constructing the server
  const issues = validateConfig(config);
  for (const issue of issues) {
    if (issue.level === "error") {
      console.error(`Config error: ${issue.message}`);
    } else {
      console.warn(`Config warning: ${issue.message}`);
    }
  }
  if (issues.some((i) => i.level === "error")) {
    process.exit(1);
  }

  const fastify = await buildApp({
    config,
    logger: {
      level: config.logLevel,
      ...(config.logPretty
        ? {
            transport: {
              target: "pino-pretty",
              options: { translateTime: "HH:MM:ss Z", ignore: "pid,hostname" },
            },
          }
        : {}),
    },
  });

  // Stop running jobs and release models before the process exits
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, "Shutting down");
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("Shutdown failed:", err);
          process.exit(1);
        },
      );
    });
  }

  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(
    { device: fastify.selector.current()?.id, builders: fastify.builders.list().length },
    `Compute service listening on http://${config.host}:${config.port}`,
  );
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
