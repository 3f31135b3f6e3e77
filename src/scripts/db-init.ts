import path from "path";
import fs from "fs";
import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import { pino } from "pino";
import { loadConfig } from "../config.js";
import { SqliteStore } from "../store/sqlite.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
const store = new SqliteStore(config.dbPath);

store.init()
  .then(() => store.close())
  .then(() => {
    log.info({ DB_PATH: config.dbPath }, "db initialized");
  })
  .catch((err) => {
    log.error({ err }, "db init failed");
    process.exit(1);
  });
