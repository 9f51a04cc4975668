import { z } from "zod";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as yaml from "yaml";
import { ConnectionConfigError, FailscopeError } from "../errors.js";

// Zod schema for configuration validation
const DefaultsSchema = z.object({
  job_name: z.string().default("mojo_runner"),
  hours_ago: z.number().positive().default(30),
  include_success: z.boolean().default(false)
});

const ConfigSchema = z.object({
  catalog_path: z.string().default("causes.yaml"),
  settings_path: z.string().default("~/.jenkins.yaml"),
  request_timeout_ms: z.number().int().positive().default(30000),
  defaults: DefaultsSchema.default({}),
  job_aliases: z.record(z.string()).default({
    mojo: "mojo_runner",
    full: "test_charm_func_full",
    lint: "test_charm_lint",
    single: "test_charm_single"
  })
});

const ConnectionSettingsSchema = z.object({
  url: z.string().url(),
  username: z.string(),
  password: z.string()
});

export type FailscopeConfig = z.infer<typeof ConfigSchema>;
export type ConnectionSettings = z.infer<typeof ConnectionSettingsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.errors.map(err => `  - ${err.path.join(".")}: ${err.message}`).join("\n");
}

/**
 * Load and validate configuration from a YAML file
 */
export function loadConfig(configPath: string = "failscope.yml"): FailscopeConfig {
  if (!fs.existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  const content = fs.readFileSync(configPath, "utf-8");
  const result = ConfigSchema.safeParse(yaml.parse(content) ?? {});
  if (!result.success) {
    throw new FailscopeError(`Invalid configuration in ${configPath}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): FailscopeConfig {
  return ConfigSchema.parse({});
}

export function expandHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === "~") return home;
  if (filePath.startsWith("~/")) return path.join(home, filePath.slice(2));
  return filePath;
}

/**
 * Map a job alias (e.g. "lint") to its job name; unknown names pass through.
 */
export function resolveJobName(jobName: string, config: FailscopeConfig): string {
  return config.job_aliases[jobName] ?? jobName;
}

const SETTINGS_EXAMPLE = [
  "Example Contents:",
  "username: <username>",
  "password: <password>",
  "url: http://jenkins.example.com:8080"
].join("\n");

/**
 * Read Jenkins connection settings (url, username, password).
 */
export function loadConnectionSettings(settingsPath: string): ConnectionSettings {
  const resolved = expandHome(settingsPath);
  if (!fs.existsSync(resolved)) {
    throw new ConnectionConfigError(
      "Jenkins config file not found",
      `Please create ${resolved}\n\n${SETTINGS_EXAMPLE}`
    );
  }

  let data: unknown;
  try {
    data = yaml.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    throw new ConnectionConfigError(`Unable to parse ${resolved}`, SETTINGS_EXAMPLE, { cause: error });
  }

  const result = ConnectionSettingsSchema.safeParse(data);
  if (!result.success) {
    throw new ConnectionConfigError(
      `Invalid Jenkins settings in ${resolved}:\n${formatIssues(result.error)}`,
      SETTINGS_EXAMPLE
    );
  }
  return result.data;
}
