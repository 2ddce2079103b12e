import { DEFAULT_OUTPUT_FILE, LOG_LEVELS, MAX_INPUT_BYTES, ValidationError } from "@mailsift/utils";
import { z } from "zod";

const configSchema = z.object({
  outputFile: z.string().min(1).default(DEFAULT_OUTPUT_FILE),
  maxFileBytes: z.coerce.number().int().positive().default(MAX_INPUT_BYTES),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type Config = z.infer<typeof configSchema>;

// An empty variable counts as unset.
function fromEnv(value: string | undefined): string | undefined {
  return value === "" ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    outputFile: fromEnv(env.MAILSIFT_OUTPUT_FILE),
    maxFileBytes: fromEnv(env.MAILSIFT_MAX_FILE_BYTES),
    logLevel: fromEnv(env.MAILSIFT_LOG_LEVEL),
  });

  if (!result.success) {
    const details: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const path = issue.path.join(".");
      if (!details[path]) details[path] = [];
      details[path].push(issue.message);
    }
    throw new ValidationError("Invalid configuration", details);
  }

  return result.data;
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

export function resetConfig(): void {
  _config = null;
}
