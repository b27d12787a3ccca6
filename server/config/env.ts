import { z } from "zod";

const commaList = z
  .string()
  .optional()
  .transform((val) =>
    (val ?? "")
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean)
  );

export const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: z.coerce.number().int().positive().default(3001),

    // Logging
    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),

    // Where songs.json, user_data.json and quotes.json live
    DATA_DIR: z.string().min(1).default("./data"),

    // Responder ids allowed to run /add, /remove and /reload
    ADMIN_USER_IDS: commaList,

    // Platform bridge. Without BRIDGE_URL outbound traffic is only logged.
    BRIDGE_URL: z.string().url("BRIDGE_URL must be a valid URL").optional(),
    BRIDGE_SECRET: z.string().min(16, "BRIDGE_SECRET must be at least 16 characters").optional(),

    // Redis (optional, keeps pending poll contexts across restarts)
    REDIS_URL: z
      .string()
      .regex(/^rediss?:\/\//, "REDIS_URL must start with redis:// or rediss://")
      .optional(),

    POLL_CONTEXT_TTL_HOURS: z.coerce.number().positive().max(24 * 90).default(168),
  })
  .refine((val) => !(val.NODE_ENV === "production" && !val.BRIDGE_SECRET), {
    message: "BRIDGE_SECRET is required in production",
    path: ["BRIDGE_SECRET"],
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const problems = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("\n");
      throw new Error(`Environment validation failed:\n${problems}`);
    }
    throw error;
  }
}

function validateEnv(): Env {
  // Unit tests construct their own stores and must not depend on the shell
  const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
  if (isTest) {
    return parseEnv({ NODE_ENV: "test", DATA_DIR: "./data", LOG_LEVEL: "error" });
  }

  return parseEnv(process.env);
}

export const env = validateEnv();
