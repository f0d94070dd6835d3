import express, { Application, Request, Response, NextFunction } from "express";
import path from "node:path";
import fs from "node:fs";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { loadConfig } from "./src/config/env";
import { createOracle } from "./src/oracle";
import { createRouter } from "./src/routes";

async function main(): Promise<void> {
  const config = loadConfig();
  const oracle = await createOracle(config);

  const app: Application = express();

  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));

  const swaggerPath = path.resolve(process.cwd(), "swagger.json");
  let swaggerDocument: swaggerUi.JsonObject | null = null;

  if (fs.existsSync(swaggerPath)) {
    try {
      swaggerDocument = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
    } catch (error) {
      console.error("Failed to parse swagger.json", error);
    }
  } else {
    console.warn(`Swagger definition not found at ${swaggerPath}. /docs route disabled.`);
  }

  if (swaggerDocument) {
    app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
  }

  app.use(createRouter({ engine: oracle.engine, health: oracle.health, version: config.version }));

  // Basic error handler for uncaught errors within the request pipeline.
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("Unhandled error", err);
    res.status(500).json({ message: "Unexpected server error" });
  });

  const server = app.listen(config.port, () => {
    console.log(`Dungeon Master's Oracle listening on port ${config.port}`);
  });

  process.on("SIGTERM", () => {
    console.log("Received SIGTERM, shutting down.");
    server.close(() => {
      oracle
        .close()
        .catch((error: unknown) => console.error("Failed to close database pool", error))
        .finally(() => process.exit(0));
    });
  });
}

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

main().catch((error: unknown) => {
  console.error("Failed to start the oracle", error);
  process.exit(1);
});
