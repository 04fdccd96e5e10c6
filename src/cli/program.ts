import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { registerConfigCommand } from "./config.ts";
import { registerDaemonCommand } from "./daemon.ts";
import { registerDbCommand } from "./db.ts";
import { registerServerCommand } from "./server.ts";
import { registerTaskCommand } from "./task.ts";

function getVersion(): string {
  // Walk up from this file to find package.json
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, "package.json");
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
      if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
      return "0.0.0";
    }
    dir = path.dirname(dir);
  }
  return "0.0.0";
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("bedrock-admin")
    .description("Scheduled console tasks for a Minecraft Bedrock server")
    .version(getVersion());

  registerTaskCommand(program);
  registerServerCommand(program);
  registerConfigCommand(program);
  registerDbCommand(program);
  registerDaemonCommand(program);

  return program;
}
