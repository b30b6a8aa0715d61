import { createServiceLogger } from "@episode-graph/graph-db";
import { createNeo4jGraph, run } from "./app.js";

const logger = createServiceLogger("Quickstart");

run(process.env, { createGraph: createNeo4jGraph, logger }).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    logger.error({ err }, "Quickstart failed");
    process.exitCode = 1;
  },
);
