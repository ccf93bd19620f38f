import path from "node:path";
import { z } from "zod";
import { DEFAULT_PIVOT_YEAR } from "./extract.js";

const optionalPath = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? path.resolve(v) : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().trim().min(1).default("127.0.0.1"),
  DATE_RENAMER_PIVOT: z.coerce
    .number()
    .int()
    .min(0)
    .max(100)
    .default(DEFAULT_PIVOT_YEAR),
  DATE_RENAMER_BACKUP_DIR: optionalPath,
  DATE_RENAMER_AUDIT_LOG: optionalPath,
  DATE_RENAMER_UPLOAD_DIR: z.string().trim().min(1).default("uploads"),
  DATE_RENAMER_OUTPUT_DIR: z.string().trim().min(1).default("output"),
});

export type AppConfig = {
  port: number;
  host: string;
  pivotYear: number;
  backupDir: string | undefined;
  auditLog: string | undefined;
  uploadDir: string;
  outputDir: string;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    pivotYear: e.DATE_RENAMER_PIVOT,
    backupDir: e.DATE_RENAMER_BACKUP_DIR,
    auditLog: e.DATE_RENAMER_AUDIT_LOG,
    uploadDir: path.resolve(e.DATE_RENAMER_UPLOAD_DIR),
    outputDir: path.resolve(e.DATE_RENAMER_OUTPUT_DIR),
  };
}
