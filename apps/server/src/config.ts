import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const repoRoot = path.resolve(__dirname, "../../..");
export const serverRoot = path.resolve(__dirname, "..");

dotenv.config({ path: path.join(repoRoot, ".env"), override: true });
dotenv.config({ override: true });

const Env = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8790),
    DATABASE_URL: z.string().min(1),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    CATALOG_PATH: z.string().optional(),
    ADMIN_TOKEN: z.string().min(8).optional()
  })
  .passthrough();

export type Env = z.infer<typeof Env>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return Env.parse(source);
}

export function resolveCatalogPath(env: Pick<Env, "CATALOG_PATH">): string {
  if (!env.CATALOG_PATH) return path.join(serverRoot, "data", "catalog.json");
  return path.isAbsolute(env.CATALOG_PATH) ? env.CATALOG_PATH : path.resolve(repoRoot, env.CATALOG_PATH);
}
