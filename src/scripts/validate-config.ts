import dotenv from "dotenv";
import { ConfigValidator } from "../services/config-validator";
import { logger } from "../utils/logger";

dotenv.config();

const result = ConfigValidator.validate(process.env);

for (const warning of result.warnings) {
  logger.warn(warning);
}

if (result.valid) {
  logger.success("Configuration is valid");
} else {
  logger.error(`Configuration has ${result.errors.length} error(s):`);
  for (const error of result.errors) {
    logger.error(`  - ${error}`);
  }
  process.exitCode = 1;
}
