// scripts/run-pipeline.ts
import "dotenv/config";
import { parseArgs } from "node:util";
import { loadConfig } from "@/app/lib/app-config";
import { runEmbeddingPipeline } from "@/app/lib/pipeline/embedding-pipeline";
import { ParquetSnapshotWriter } from "@/app/lib/pipeline/snapshot";
import { createEmbeddingProvider, createProductIndex } from "@/app/lib/services";
import { logTypesenseConfig } from "@/app/lib/typesense-config";

async function main() {
  const { values } = parseArgs({
    options: {
      "csv-path": { type: "string" },
      "model-name": { type: "string" },
    },
  });

  const config = loadConfig({
    ...process.env,
    ...(values["model-name"] ? { EMBEDDING_MODEL: values["model-name"] } : {}),
  });
  logTypesenseConfig(config);

  const report = await runEmbeddingPipeline(
    {
      index: createProductIndex(config),
      embedder: createEmbeddingProvider(config),
      snapshots: new ParquetSnapshotWriter(config.snapshotsDir),
    },
    {
      csvPath: values["csv-path"] ?? config.dataPath,
      exchangeRate: config.exchangeRate,
      batchSize: config.batchSize,
    }
  );

  for (const failure of report.skipped) {
    console.warn(`  row ${failure.rowIndex} (${failure.productId ?? "no id"}): ${failure.message}`);
  }
  console.log(`Snapshot saved to ${report.snapshotPath}`);
}

main().catch((error) => {
  console.error("Pipeline failed:", error);
  process.exit(1);
});
