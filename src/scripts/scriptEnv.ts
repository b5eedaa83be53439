import "dotenv/config";
import axios from "axios";
import { z } from "zod";

const scriptEnvSchema = z.object({
  BACKEND_URL: z.string().url().default("http://localhost:3001"),
  KEEPER_API_KEY: z.string().optional(),
  ADMIN_API_KEY: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  NODE_ENV: z.string().default("development"),
});

export type ScriptEnv = z.infer<typeof scriptEnvSchema>;

export function loadScriptEnv(source: NodeJS.ProcessEnv = process.env): ScriptEnv {
  const result = scriptEnvSchema.safeParse(source);
  if (!result.success) {
    throw new Error(
      `Invalid environment: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`
    );
  }
  return result.data;
}

/** One-line description of a failed API call. */
export function describeApiError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const data: unknown = error.response.data;
      const message =
        typeof data === "object" && data !== null && "error" in data
          ? String(data.error)
          : error.message;
      return `HTTP ${error.response.status}: ${message}`;
    }
    return `No response from backend: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
