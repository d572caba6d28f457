import { buildApp } from "./app";
import { loadPipelineConfig } from "./config/pipeline_config";
import { createLogger } from "./logger";

async function main() {
  const config = loadPipelineConfig();
  const { app } = buildApp({ config, logger: true });
  await app.listen({ port: config.port, host: "0.0.0.0" });
}

main().catch((err) => {
  createLogger({ name: "turnwise" }).error(
    { evt: "server.start_failed", error: String(err) },
    "server.start_failed"
  );
  process.exit(1);
});
