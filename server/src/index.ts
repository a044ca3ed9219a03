import path from "node:path";
import { fileURLToPath } from "node:url";
import { createApp } from "./app";
import { listImages } from "./catalog";
import { loadConfig } from "./config";
import { SqliteAnnotationStore } from "./datastore";
import { ConfigurationError, StorageUnavailable } from "./errors";
import { log } from "./log";
import { NavigationController } from "./navigation";
import { progressStats } from "./stats";

const STATIC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../frontend/dist");

function main(): void {
  const config = loadConfig();
  const images = listImages(config.imagesFolder, config.allowedExtensions);
  const store = new SqliteAnnotationStore(config.databasePath);
  const session = new NavigationController({
    images,
    store,
    numClasses: config.numClasses,
    maxHistory: config.maxHistory,
  });
  session.jumpToFirstUnannotated();

  const stats = progressStats(images, store.listAll());
  log.info(`Starting ${config.title}`);
  log.info("Configuration:");
  log.info(`  - Images folder: ${config.imagesFolder}`);
  log.info(`  - Database: ${config.databasePath}`);
  log.info(`  - Number of classes: ${config.numClasses}`);
  log.info(`  - Undo depth: ${config.maxHistory}`);
  log.info(`  - Annotating as: ${config.username}`);
  log.info(`  - Total images: ${stats.total}`);
  log.info(`  - Already annotated: ${stats.annotated}`);
  log.info(`  - Starting at image ${session.currentIndex + 1}: ${session.current()}`);

  const app = createApp({ config, store, session, staticDir: STATIC_DIR });
  const server = app.listen(config.port, config.host, () => {
    log.info(`Listening on http://${config.host}:${config.port}`);
  });

  const shutdown = () => {
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigurationError || err instanceof StorageUnavailable) {
    log.error(`${err.name}: ${err.message}`);
  } else {
    log.error("Failed to start:", err);
  }
  process.exit(1);
}
