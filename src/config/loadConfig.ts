import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigurationError } from "../sim/errors.js";
import { AGENT_KINDS } from "../agents/index.js";
import { RENDER_PRESET_NAMES } from "./presets.js";
import {
  DEFAULT_DELAY_REWARD,
  DEFAULT_DELIVERY_REWARD,
  DEFAULT_MAP_FILE,
  DEFAULT_MAX_TIME_STEPS,
  DEFAULT_MOVE_COST,
  DEFAULT_OUT_DIR,
  DEFAULT_PACKAGES,
  DEFAULT_ROBOTS,
  DEFAULT_SEED,
} from "./constants.js";

const booleanLike = z.union([
  z.boolean(),
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((v) => v === "true" || v === "1" || v === "yes"),
]);

export const simulationConfigSchema = z.object({
  mapFile: z.string().min(1),
  robots: z.coerce.number().int().min(0),
  packages: z.coerce.number().int().min(0),
  maxTimeSteps: z.coerce.number().int().min(1),
  seed: z.coerce.number().int(),
  moveCost: z.coerce.number(),
  deliveryReward: z.coerce.number().min(0),
  delayReward: z.coerce.number().min(0),
  agent: z.enum(AGENT_KINDS),
  outDir: z.string().min(1),
  renderPreset: z.enum(RENDER_PRESET_NAMES),
  verbose: booleanLike,
});

export type SimulationConfig = z.infer<typeof simulationConfigSchema>;

/** JSON 설정 파일 형식: { environment: {...}, agent: { type } } */
const configFileSchema = z.object({
  environment: z
    .object({
      map_file: z.string(),
      n_robots: z.number(),
      n_packages: z.number(),
      max_time_steps: z.number(),
      seed: z.number(),
      move_cost: z.number(),
      delivery_reward: z.number(),
      delay_reward: z.number(),
    })
    .partial()
    .default({}),
  agent: z.object({ type: z.string() }).partial().default({}),
});

type ConfigFile = z.infer<typeof configFileSchema>;

export type Env = Record<string, string | undefined>;

const envValue = (env: Env, key: string): string | undefined =>
  env[key]?.trim() || undefined;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
}

export function readConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(
      `Invalid config file ${path}: ${issues.join("; ")}`,
      { path, issues },
    );
  }
  return parsed.data;
}

/**
 * 설정 우선순위: 환경 변수(SIM_*) > JSON 설정 파일(SIM_CONFIG) > 기본값.
 * 검증 실패는 ConfigurationError 하나로 모아서 던진다.
 */
export function loadConfig(env: Env = process.env): SimulationConfig {
  const configPath = envValue(env, "SIM_CONFIG");
  const file: ConfigFile = configPath
    ? readConfigFile(configPath)
    : { environment: {}, agent: {} };
  const fe = file.environment;

  const raw = {
    mapFile: envValue(env, "SIM_MAP_FILE") ?? fe.map_file ?? DEFAULT_MAP_FILE,
    robots: envValue(env, "SIM_ROBOTS") ?? fe.n_robots ?? DEFAULT_ROBOTS,
    packages: envValue(env, "SIM_PACKAGES") ?? fe.n_packages ?? DEFAULT_PACKAGES,
    maxTimeSteps:
      envValue(env, "SIM_MAX_STEPS") ??
      fe.max_time_steps ??
      DEFAULT_MAX_TIME_STEPS,
    seed: envValue(env, "SIM_SEED") ?? fe.seed ?? DEFAULT_SEED,
    moveCost: fe.move_cost ?? DEFAULT_MOVE_COST,
    deliveryReward: fe.delivery_reward ?? DEFAULT_DELIVERY_REWARD,
    delayReward: fe.delay_reward ?? DEFAULT_DELAY_REWARD,
    agent: envValue(env, "SIM_AGENT") ?? file.agent.type ?? "greedy",
    outDir: envValue(env, "SIM_OUT_DIR") ?? DEFAULT_OUT_DIR,
    renderPreset: envValue(env, "SIM_RENDER_PRESET") ?? "default",
    verbose: envValue(env, "SIM_VERBOSE") ?? false,
  };

  const parsed = simulationConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(
      `Invalid configuration: ${issues.join("; ")}`,
      { issues },
    );
  }
  return parsed.data;
}
