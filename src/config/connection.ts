import os from "node:os";
import path from "node:path";
import process from "node:process";
import { z } from "zod/v4";
import { getConfigValue } from "../db/config.ts";

/** Key of the `config` table row holding the stored connection profile. */
export const CONNECTION_CONFIG_KEY = "connection";

const DEFAULT_KEY_PATH = "~/.ssh/minecraft_panel_rsa";
const DEFAULT_CONTAINER = "minecraft-bedrock-server";

const localProfileSchema = z.object({
  mode: z.literal("local"),
  container: z.string().trim().min(1),
});

const sshProfileSchema = z.object({
  mode: z.literal("ssh"),
  container: z.string().trim().min(1),
  host: z.string().trim().min(1),
  port: z.number().int().min(1).max(65535).default(22),
  user: z.string().trim().min(1),
  keyPath: z.string().trim().min(1).default(DEFAULT_KEY_PATH),
  strictHostKeyChecking: z.boolean().default(false),
});

export const connectionProfileSchema = z.discriminatedUnion("mode", [
  localProfileSchema,
  sshProfileSchema,
]);

export type LocalProfile = z.infer<typeof localProfileSchema>;
export type SshProfile = z.infer<typeof sshProfileSchema>;
export type ConnectionProfile = z.infer<typeof connectionProfileSchema>;

export class InvalidConnectionProfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConnectionProfileError";
  }
}

/** Expand a leading `~` to the current user's home directory. */
export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function parseConnectionProfile(value: unknown): ConnectionProfile {
  const result = connectionProfileSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidConnectionProfileError(`Invalid connection profile: ${issues}`);
  }
  return result.data;
}

/**
 * Build a profile from the legacy environment variables
 * (CONNECTION_TYPE, CONTAINER_NAME, SSH_HOST, SSH_PORT, SSH_USER, SSH_KEY_PATH).
 */
export function profileFromEnv(env: NodeJS.ProcessEnv = process.env): ConnectionProfile {
  const mode = env.CONNECTION_TYPE ?? (env.SSH_HOST ? "ssh" : "local");
  const container = env.CONTAINER_NAME ?? DEFAULT_CONTAINER;

  if (mode === "local") {
    return parseConnectionProfile({ mode, container });
  }

  return parseConnectionProfile({
    mode,
    container,
    host: env.SSH_HOST,
    port: env.SSH_PORT ? parseInt(env.SSH_PORT, 10) : undefined,
    user: env.SSH_USER ?? "admin",
    keyPath: env.SSH_KEY_PATH,
    strictHostKeyChecking: env.SSH_STRICT_HOST_KEY_CHECKING === "true",
  });
}

/**
 * Resolve the profile for the current tick: the stored `connection` config
 * entry wins over the environment.
 */
export async function loadConnectionProfile(): Promise<ConnectionProfile> {
  const stored = await getConfigValue<unknown>(CONNECTION_CONFIG_KEY);
  if (stored !== null) {
    return parseConnectionProfile(stored);
  }
  return profileFromEnv();
}

export function describeProfile(profile: ConnectionProfile): string {
  if (profile.mode === "local") {
    return `local docker, container "${profile.container}"`;
  }
  return `ssh ${profile.user}@${profile.host}:${profile.port}, container "${profile.container}"`;
}
