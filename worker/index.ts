import { loadSettings } from "../src/config/settings";
import { Orchestrator } from "../src/application/orchestrator";
import { createDependencies } from "../src/infrastructure/container";
import { findMissingTools } from "../src/infrastructure/media/mkvContainer";

async function main() {
  const settings = loadSettings();

  const missing = await findMissingTools();
  if (missing.length) {
    console.error(`Missing required tools: ${missing.join(", ")}. Install them and make sure they are on PATH.`);
    process.exit(1);
  }

  const runtime = createDependencies(settings);
  const orchestrator = new Orchestrator(runtime.deps);
  await orchestrator.start();

  let stopping = false;
  const shutdown = async () => {
    if (stopping) {
      return;
    }
    stopping = true;
    await orchestrator.stop();
    await runtime.close();
    process.exit(0);
  };

  process.on("SIGTERM", () => {
    void shutdown();
  });
  process.on("SIGINT", () => {
    void shutdown();
  });

  console.log(
    `Subtitle worker running (pid=${process.pid}, workers=${orchestrator.queue.workerCount}, db=${settings.databasePath}).`
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
