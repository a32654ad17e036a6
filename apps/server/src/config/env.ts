import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(5000),
  DATABASE_PATH: z.string().min(1).default("data/library.db"),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  JWT_SECRET: z.string().min(16),
  MAX_BORROWED_BOOKS: z.coerce.number().int().min(1).default(3),
  LOAN_WEEKS: z.coerce.number().int().min(1).max(52).default(4),
  AUDIT_LOG: z.enum(["true", "false"]).default("true")
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error("Invalid environment variables", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

export const corsOrigins = env.CORS_ORIGIN.split(",").map((origin) => origin.trim());

export const auditLogEnabled = env.AUDIT_LOG === "true";
