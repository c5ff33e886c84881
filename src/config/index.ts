import { readFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  APP_NAME,
  DEFAULT_INPUT_FILE,
  DEFAULT_REPORT_FILE,
  DEFAULT_SAMPLE_EVENTS,
  DEFAULT_SUSPICIOUS_EVENTS,
  DEFAULT_TOP_EVENT_TYPES,
} from "../constants.js";
import { ConfigError, errorMessage } from "../errors.js";
import type { RuntimeConfig } from "../types.js";
import { buildConfigValidator, formatValidationErrors, type RawSysmonReportConfig } from "./validator.js";

export interface CliConfig {
  configFile?: string;
}

interface RuntimeConfigContext {
  cli: CliConfig;
  env: NodeJS.ProcessEnv;
  cwd?: string;
}

export function parseCliArgs(argv: string[], cwd = process.cwd()): CliConfig {
  let configFile: string | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--config") {
      const next = argv[i + 1];
      if (!next) {
        throw new ConfigError("Missing value for --config");
      }
      configFile = resolvePath(next, cwd);
      i += 1;
      continue;
    }

    if (arg === "--help" || arg === "-h") {
      printHelpAndExit(0);
    }

    throw new ConfigError(`Unknown argument: ${arg}`);
  }

  return { configFile };
}

export function resolveRuntimeConfig(context: RuntimeConfigContext): RuntimeConfig {
  const cwd = context.cwd ?? process.cwd();
  const { rawConfig, baseDir } = loadRawConfig(context.cli.configFile, cwd);

  const inputFile = resolveFilePath(rawConfig.input_file, baseDir, context.env.SYSMON_INPUT_FILE, cwd, DEFAULT_INPUT_FILE);
  const reportFile = resolveFilePath(
    rawConfig.report_file,
    baseDir,
    context.env.SYSMON_REPORT_FILE,
    cwd,
    DEFAULT_REPORT_FILE,
  );

  return {
    inputFile,
    reportFile,
    console: {
      topEventTypes: rawConfig.console?.top_event_types ?? DEFAULT_TOP_EVENT_TYPES,
      sampleEvents: rawConfig.console?.sample_events ?? DEFAULT_SAMPLE_EVENTS,
      suspiciousEvents: rawConfig.console?.suspicious_events ?? DEFAULT_SUSPICIOUS_EVENTS,
    },
  };
}

export function printHelpAndExit(exitCode: number): never {
  const lines = [
    `Usage: ${APP_NAME} [options]`,
    "",
    "Options:",
    "  --config <path>    JSON config file for input, report and console settings",
    "  -h, --help         Show help",
    "",
    "Environment:",
    `  SYSMON_INPUT_FILE   Sysmon XML export to read (default: ${DEFAULT_INPUT_FILE})`,
    `  SYSMON_REPORT_FILE  Text report to write (default: ${DEFAULT_REPORT_FILE})`,
  ];

  // eslint-disable-next-line no-console
  console.error(lines.join("\n"));
  process.exit(exitCode);
}

function loadRawConfig(configFile: string | undefined, cwd: string): { rawConfig: RawSysmonReportConfig; baseDir: string } {
  if (!configFile) {
    return { rawConfig: {}, baseDir: cwd };
  }

  let rawText: string;
  try {
    rawText = readFileSync(configFile, "utf8");
  } catch (error: unknown) {
    throw new ConfigError(`Failed to read config file ${configFile}: ${errorMessage(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawText);
  } catch (error: unknown) {
    throw new ConfigError(`Invalid JSON in config file ${configFile}: ${errorMessage(error)}`, { cause: error });
  }

  if (!parsed || Array.isArray(parsed) || typeof parsed !== "object") {
    throw new ConfigError("Config file root must be a JSON object");
  }

  const validate = buildConfigValidator();
  if (!validate(parsed)) {
    throw new ConfigError(`Invalid config file ${configFile}: ${formatValidationErrors(validate.errors)}`);
  }

  return { rawConfig: parsed, baseDir: path.dirname(configFile) };
}

function resolveFilePath(
  fromConfig: string | null | undefined,
  baseDir: string,
  fromEnv: string | undefined,
  cwd: string,
  fallback: string,
): string {
  if (fromConfig) {
    return resolvePath(fromConfig, baseDir);
  }

  if (fromEnv && fromEnv.trim() !== "") {
    return resolvePath(fromEnv.trim(), cwd);
  }

  return resolvePath(fallback, cwd);
}

function resolvePath(value: string, baseDir: string): string {
  if (value === "~") {
    return os.homedir();
  }

  if (value.startsWith("~/")) {
    return path.resolve(os.homedir(), value.slice(2));
  }

  if (path.isAbsolute(value)) {
    return value;
  }

  return path.resolve(baseDir, value);
}
