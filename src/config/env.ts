import { config } from "dotenv";
import { z } from "zod";

config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  MONGO_URI: z.string().min(1).default("mongodb://127.0.0.1:27017/trivia"),
  CORS_ORIGIN: z.string().min(1).default("*"),
  LOG_REQUESTS: booleanFlag.default("true"),
});

export type AppConfig = z.infer<typeof envSchema>;

export const loadConfig = (
  source: Record<string, string | undefined> = process.env
): AppConfig => {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map(({ path, message }) => `${path.join(".")}: ${message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration - ${problems}`);
  }
  return result.data;
};
