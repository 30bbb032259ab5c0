#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { setLogLevel } from "../utils/log";
import { runCli } from "./program";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.IMAGING_PIPELINE_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const argv = process.argv.slice(2);
const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvPath(argv, defaultEnvPath);
dotenv.config({ path: envPath });
setLogLevel(process.env.LOG_LEVEL);

void runCli(argv, { envPath }).then((exitCode) => {
  process.exitCode = exitCode;
});
