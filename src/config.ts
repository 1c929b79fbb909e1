import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";

export const PROVIDER_KINDS = ["cenguigui", "uuuka", "duanju-search"] as const;
export type ProviderKind = (typeof PROVIDER_KINDS)[number];

const CONFIG_FILE_NAME = "reelhub.jsonc";
const DEFAULT_SERVER_PORT = 8080;

const qualitySchema = z.string().regex(/^\d{3,4}p$/, { message: "quality must look like 1080p" });

const providerSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(PROVIDER_KINDS),
  enabled: z.boolean().default(true),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().min(100).max(120000).default(10000),
  qpsBudget: z.number().positive().max(100).default(2),
  qualities: z.array(qualitySchema).optional(),
  lookbackDays: z.number().int().min(1).max(90).optional()
});

const ttlSchema = z.object({
  search: z.number().int().min(0).optional(),
  categories: z.number().int().min(0).optional(),
  categoryDramas: z.number().int().min(0).optional(),
  recommendations: z.number().int().min(0).optional(),
  episodes: z.number().int().min(0).optional(),
  videoUrl: z.number().int().min(0).optional()
});

const cacheSchema = z.object({
  maxEntries: z.number().int().min(1).max(100000).default(500),
  negativeTtlMs: z.number().int().min(0).default(5000),
  ttlMs: ttlSchema.default({})
});

const governorSchema = z.object({
  maxQueueDepth: z.number().int().min(0).max(10000).default(32)
});

const budgetsSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(4),
  retries: z.number().int().min(0).max(5).default(1),
  retryDelayMs: z.number().int().min(0).max(60000).default(250)
});

const serverSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65535).default(DEFAULT_SERVER_PORT)
});

const configSchema = z.object({
  providers: z.array(providerSchema).default([
    { id: "cenguigui", kind: "cenguigui" },
    { id: "uuuka", kind: "uuuka" },
    { id: "duanju-search", kind: "duanju-search" }
  ]),
  activeProvider: z.string().min(1).optional(),
  cache: cacheSchema.default({}),
  governor: governorSchema.default({}),
  budgets: budgetsSchema.default({}),
  server: serverSchema.default({})
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  for (const [index, provider] of config.providers.entries()) {
    if (seen.has(provider.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["providers", index, "id"],
        message: `duplicate provider id ${provider.id}`
      });
    }
    seen.add(provider.id);
  }
  if (config.activeProvider && !config.providers.some((provider) => provider.enabled && provider.id === config.activeProvider)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["activeProvider"],
      message: `activeProvider ${config.activeProvider} is not an enabled provider`
    });
  }
});

export type ReelhubConfig = z.infer<typeof configSchema>;
export type ProviderConfig = z.infer<typeof providerSchema>;

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.REELHUB_CONFIG) {
    return path.resolve(env.REELHUB_CONFIG);
  }
  const configDir = env.REELHUB_CONFIG_DIR || path.join(os.homedir(), ".config", "reelhub");
  return path.join(configDir, CONFIG_FILE_NAME);
}

function readConfigFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const content = fs.readFileSync(filePath, "utf-8");
  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true, allowEmptyContent: true });
  if (errors.length > 0) {
    const firstError = errors[0];
    const reason = firstError ? printParseErrorCode(firstError.error) : "unknown";
    throw new Error(`Invalid JSONC in reelhub config at ${filePath}: ${reason} at offset ${firstError?.offset ?? 0}`);
  }
  return parsed ?? {};
}

/** Validates a raw config object and applies defaults. */
export function parseConfig(raw: unknown, source = "<inline>"): ReelhubConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new Error(`Invalid reelhub config at ${source}: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(filePath: string = getConfigPath()): ReelhubConfig {
  return parseConfig(readConfigFile(filePath), filePath);
}
