import dotenv from "dotenv";
import path from "path";
import { z } from "zod";
import networkConfig from "../constants/networkConfig.json";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    PORT: z.coerce.number().int().positive().default(3001),
    BACKEND_URL: z.string().url().default("http://localhost:3001"),
    NETWORK: z.string().default("hardhat"),
    ADMIN_API_KEY: z.string().min(1, "ADMIN_API_KEY is required"),
    KEEPER_API_KEY: optionalString,
    DATABASE_URL: optionalString,
    FRONTEND_URL: optionalString,

    // Raffle overrides (network defaults come from constants/networkConfig.json)
    RAFFLE_ENTRANCE_FEE: optionalString, // in ether units, e.g. "0.01"
    RAFFLE_INTERVAL_SEC: optionalString,
    VRF_KEY_HASH: optionalString,
    VRF_SUBSCRIPTION_ID: optionalString,
    VRF_REQUEST_CONFIRMATIONS: optionalString,
    VRF_CALLBACK_GAS_LIMIT: optionalString,

    // Remote randomness service (non-development networks)
    VRF_SERVICE_URL: optionalString,
    VRF_SERVICE_API_KEY: optionalString,
    VRF_WEBHOOK_SECRET: optionalString,

    // Local mock coordinator
    VRF_SUB_FUND_AMOUNT: z.string().default("1000"), // in LINK

    UPKEEP_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(30_000),
  })
  .superRefine((env, ctx) => {
    if (!(env.NETWORK in networkConfig.networks)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["NETWORK"],
        message: `Unknown network "${env.NETWORK}" (known: ${Object.keys(
          networkConfig.networks
        ).join(", ")})`,
      });
      return;
    }
    if (networkConfig.developmentNetworks.includes(env.NETWORK)) return;

    if (!env.VRF_SERVICE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["VRF_SERVICE_URL"],
        message: "VRF_SERVICE_URL is required outside development networks",
      });
    }
    if (!env.VRF_WEBHOOK_SECRET || env.VRF_WEBHOOK_SECRET.length < 32) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["VRF_WEBHOOK_SECRET"],
        message:
          "VRF_WEBHOOK_SECRET of at least 32 characters is required outside development networks",
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/** Validate an environment map. Throws with every problem listed. */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }
  return result.data;
}

/**
 * Load the root .env file (if any) into process.env and validate it.
 * Exits the process when required configuration is missing.
 */
export function loadEnv(): Env {
  const envPath = path.resolve(__dirname, "../../.env");
  const result = dotenv.config({ path: envPath });

  if (result.error) {
    console.log(
      `⚠️ No .env file found at ${envPath}, using system environment variables`
    );
  } else {
    console.log(`✅ Environment loaded from: ${envPath}`);
  }

  try {
    const env = parseEnv(process.env);
    console.log(`[CONFIG] Environment: ${env.NODE_ENV}`);
    console.log(`[CONFIG] Network: ${env.NETWORK}`);
    console.log(`[CONFIG] Backend URL: ${env.BACKEND_URL}`);
    console.log(`[CONFIG] Admin API Key length: ${env.ADMIN_API_KEY.length}`);
    return env;
  } catch (err) {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
