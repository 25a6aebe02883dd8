import { z } from "zod";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const currentFile = fileURLToPath(import.meta.url);
const currentDir = path.dirname(currentFile);

// Load .env from both package cwd and repo root so running from apps/web or repo root both work.
dotenv.config({ path: path.resolve(process.cwd(), ".env") });
dotenv.config({ path: path.resolve(currentDir, "../../../../.env") });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(5000),
  CORS_ORIGIN: z.string().default("*"),
  MONGODB_URI: z.string().min(1),
  MONGODB_DB_NAME: z.string().min(1).default("shopfront"),
  JWT_SECRET: z.string().min(16),
  CURRENCY: z.string().length(3).default("EGP"),
  PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(12),
  HOME_SECTION_LIMIT: z.coerce.number().int().min(1).max(48).default(8),
  STATIC_CACHE_SECONDS: z.coerce.number().int().min(0).default(3600),
  PUBLIC_DIR: z.string().default(path.resolve(currentDir, "../../public"))
});

export const env = envSchema.parse(process.env);
