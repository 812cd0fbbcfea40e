import dotenv from "dotenv";
import { createStateStore } from "../bootstrap";
import { loadConfig } from "../config";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/monitor-error";

dotenv.config();

/**
 * Forget the stored addresses and update mark. The next run is a first run.
 */
async function clearState(): Promise<void> {
  const config = loadConfig(process.env);
  const backend = createStateStore(config);

  try {
    logger.info(`Clearing ${config.state.backend} state...`);
    await backend.store.clear();
    logger.success("Monitor state cleared successfully");
  } catch (error) {
    logger.error(`Error clearing state: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await backend.close();
  }
}

clearState().catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exitCode = 1;
});
