import dotenv from "dotenv";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { getLogger, loadConfig } from "@core";
import { createApp } from "./app";

// Load env from repo root first, then allow app-local overrides
const rootEnv = fileURLToPath(new URL("../../../.env", import.meta.url));
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const logger = getLogger("api");
const config = loadConfig();
const app = createApp({ config, logger });

app.listen(config.port, () => {
  logger.info("api.listen", { port: config.port, max_ocr_pages: config.maxOcrPages, ocr_lang: config.ocrLang });
});
