import * as path from "node:path";
import { z } from "zod";
import type { IFileSystem } from "./abstractions/IFileSystem";
import type { LogLevel } from "./logging";
import { ConfigError } from "./errors";

export interface ProvisionConfig {
  /** Model to pull, e.g. "deepseek-r1:7b". */
  modelId: string;
  /** Port the model runtime listens on. */
  port: number;
  /** How long to wait for the runtime to accept connections. */
  timeoutSeconds: number;
  pollIntervalSeconds: number;
  /** Attempts for the model pull. */
  retryCount: number;
  retryDelaySeconds: number;
  /** Running inside a hosted dev container (CODESPACES=true); enables port exposure. */
  hostingContextEnabled: boolean;
  /** Identifier of the hosted environment (CODESPACE_NAME). */
  environmentName?: string;
  /** File that exported variables are appended to (GITHUB_ENV). */
  githubEnvPath?: string;
  logFile: string;
  logLevel: LogLevel;
  systemPackages: string[];
  /** Commands whose presence means the system packages are already installed. */
  systemCommands: string[];
  pythonPackages: string[];
  runtimeInstallUrl: string;
  runtimeBinDir: string;
  /** Where the runtime stores pulled models (OLLAMA_MODELS). */
  modelsDir: string;
  shellProfile: string;
  requirementsFile: string;
  /** How long a stopped runtime gets between SIGTERM and SIGKILL. */
  serviceStopGraceMs: number;
}

const nonEmpty = z.string().min(1);

const FileConfigSchema = z
  .object({
    modelId: nonEmpty,
    port: z.number().int().min(1).max(65535),
    timeoutSeconds: z.number().positive(),
    pollIntervalSeconds: z.number().positive(),
    retryCount: z.number().int().min(1),
    retryDelaySeconds: z.number().min(0),
    hostingContextEnabled: z.boolean(),
    environmentName: nonEmpty,
    githubEnvPath: nonEmpty,
    logFile: nonEmpty,
    logLevel: z.enum(["info", "debug"]),
    systemPackages: z.array(nonEmpty),
    systemCommands: z.array(nonEmpty),
    pythonPackages: z.array(nonEmpty),
    runtimeInstallUrl: z.string().url(),
    runtimeBinDir: nonEmpty,
    modelsDir: nonEmpty,
    shellProfile: nonEmpty,
    requirementsFile: nonEmpty,
    serviceStopGraceMs: z.number().int().min(0),
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface ResolveConfigOptions {
  homedir: string;
  configPath?: string;
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export function defaultConfig(homedir: string): ProvisionConfig {
  return {
    modelId: "deepseek-r1:7b",
    port: 11434,
    timeoutSeconds: 30,
    pollIntervalSeconds: 1,
    retryCount: 3,
    retryDelaySeconds: 10,
    hostingContextEnabled: false,
    logFile: "codespaces_setup.log",
    logLevel: "info",
    systemPackages: ["python3", "python3-pip", "curl"],
    systemCommands: ["python3", "pip3", "curl"],
    pythonPackages: ["flask", "flask-cors", "python-dotenv", "ollama", "flask_limiter"],
    runtimeInstallUrl: "https://ollama.com/install.sh",
    runtimeBinDir: path.posix.join(homedir, ".ollama", "bin"),
    modelsDir: path.posix.join(homedir, ".ollama", "models"),
    shellProfile: path.posix.join(homedir, ".bashrc"),
    requirementsFile: "requirements.txt",
    serviceStopGraceMs: 5_000,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("\n");
}

export function parseFileConfig(raw: string, source: string): FileConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = FileConfigSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

async function loadFileConfig(fs: IFileSystem, options: ResolveConfigOptions): Promise<FileConfig> {
  if (options.configPath) {
    if (!(await fs.exists(options.configPath))) {
      throw new ConfigError(`Config file not found: ${options.configPath}`);
    }
    return parseFileConfig(await fs.readFile(options.configPath), options.configPath);
  }

  const cwdConfig = options.cwd ? path.posix.join(options.cwd, "config.json") : undefined;
  if (cwdConfig && (await fs.exists(cwdConfig))) {
    return parseFileConfig(await fs.readFile(cwdConfig), cwdConfig);
  }
  return {};
}

function parsePort(key: string, value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Environment variable ${key} must be a port number (1-65535), got: ${value}`);
  }
  return port;
}

/**
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
function parseBool(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(`Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`);
}

function parseLogLevel(key: string, value: string): LogLevel {
  if (value === "info" || value === "debug") {
    return value;
  }
  throw new ConfigError(`Environment variable ${key} must be "info" or "debug", got: ${value}`);
}

/**
 * Defaults, then the config file, then environment variables.
 */
export async function resolveConfig(fs: IFileSystem, options: ResolveConfigOptions): Promise<ProvisionConfig> {
  const fileConfig = await loadFileConfig(fs, options);
  const merged: ProvisionConfig = { ...defaultConfig(options.homedir), ...fileConfig };

  // Env vars override everything; empty values count as unset
  const env = options.env ?? {};
  const getEnv = (key: string): string | undefined => {
    const value = env[key];
    return value !== undefined && value !== "" ? value : undefined;
  };

  const modelName = getEnv("MODEL_NAME");
  if (modelName) {
    merged.modelId = modelName;
  }
  const port = getEnv("OLLAMA_PORT");
  if (port) {
    merged.port = parsePort("OLLAMA_PORT", port);
  }
  const modelsDir = getEnv("OLLAMA_MODELS");
  if (modelsDir) {
    merged.modelsDir = modelsDir;
  }
  const codespaces = getEnv("CODESPACES");
  if (codespaces) {
    merged.hostingContextEnabled = parseBool("CODESPACES", codespaces);
  }
  const codespaceName = getEnv("CODESPACE_NAME");
  if (codespaceName) {
    merged.environmentName = codespaceName;
  }
  const githubEnv = getEnv("GITHUB_ENV");
  if (githubEnv) {
    merged.githubEnvPath = githubEnv;
  }
  const logFile = getEnv("PROVISION_LOG_FILE");
  if (logFile) {
    merged.logFile = logFile;
  }
  const logLevel = getEnv("PROVISION_LOG_LEVEL");
  if (logLevel) {
    merged.logLevel = parseLogLevel("PROVISION_LOG_LEVEL", logLevel);
  }

  return merged;
}
