// Load and validate the environment
// Throws at startup if any variable is malformed
import * as dotenv from "dotenv";
import findConfig from "find-config";
import path from "path";

dotenv.config({
  path: findConfig(".env") || path.resolve(process.cwd(), ".env"),
});

import { z } from "zod";

const zodEnv = z.object({
  NODE_ENV: z.string().min(1).optional().default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),

  // port
  PORT: z.coerce.number().int().min(0).max(65535).optional().default(8000),
  JSON_BODY_LIMIT: z.string().min(1).optional().default("1mb"),

  // Firebase configs (history is disabled without a service account)
  FIREBASE_SERVICE_ACCOUNT: z.string().min(1).optional(),
  FIRESTORE_HISTORY_COLLECTION: z.string().min(1).optional().default("qr"),

  // Logo overlay
  LOGO_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(6000),
});

type Env = z.infer<typeof zodEnv>;

function parseEnv(source: NodeJS.ProcessEnv): Env {
  try {
    return zodEnv.parse(source);
  } catch (err) {
    if (err instanceof z.ZodError) {
      const { fieldErrors } = err.flatten();
      const errorMessage = Object.entries(fieldErrors)
        .map(([field, errors]) =>
          errors ? `${field}: ${errors.join(", ")}` : field
        )
        .join("\n  ");
      throw new Error(`Invalid environment variables:\n  ${errorMessage}`);
    }
    throw err;
  }
}

export const env = parseEnv(process.env);
