/**
 * Daemon entry point.
 *
 * Usage: tsx src/daemon/index.ts
 */

import { config } from "dotenv";
import { loadEnvConfig } from "../config/env.ts";
import { SchedulerDaemon } from "./service.ts";

config({ path: [".env.local", ".env"], quiet: true });

const daemon = new SchedulerDaemon(loadEnvConfig());
await daemon.start();
