#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import {
  createLogger,
  GitRepositoryGateway,
  type Logger,
  loadConfig,
  type PartialConfig,
} from "@rewind/core";
import { Command } from "commander";
import { render } from "ink";
import { App } from "./app.js";
import { executeShutdownCleanup, installSignalHandlers, onShutdown } from "./shutdown.js";
import { createStartupLogger } from "./startup.js";
import { enterAlternateBuffer, exitAlternateBuffer } from "./tui/terminal.js";
import { Controller, createExecutor } from "./tui/runtime/index.js";
import { createInitialState } from "./tui/state/index.js";
import { DEFAULT_SUGGESTIONS } from "./tui/text.js";
import { version } from "./version.js";

interface CliOptions {
  readonly debug?: boolean;
  readonly cwd?: string;
}

const startupLogger = createStartupLogger();

function fail(message: string): never {
  startupLogger.error(message);
  process.exit(1);
}

function resolveWorkDir(requested: string): string {
  const workDir = path.resolve(requested);
  try {
    if (!fs.statSync(workDir).isDirectory()) {
      fail(`${workDir} is not a directory`);
    }
  } catch (error) {
    fail(`cannot use ${workDir}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return workDir;
}

async function run(options: CliOptions): Promise<void> {
  const overrides: PartialConfig = {};
  if (options.debug) {
    overrides.debug = true;
  }

  const configResult = loadConfig({ cwd: options.cwd, overrides });
  if (!configResult.ok) {
    fail(configResult.error.message);
  }
  const config = configResult.value;
  const workDir = resolveWorkDir(options.cwd ?? config.workingDir ?? process.cwd());

  const logger: Logger = createLogger({
    level: config.debug ? "debug" : config.logLevel,
    file: { enabled: config.debug, path: path.resolve(workDir, config.logFile) },
  });
  onShutdown(() => logger.dispose());
  logger.info("Starting", { version, workDir, remote: config.remote });

  const gateway = new GitRepositoryGateway(workDir, { remote: config.remote, logger });
  const suggestions = config.suggestions ?? DEFAULT_SUGGESTIONS;
  const controller = new Controller({
    initialState: createInitialState(suggestions),
    execute: createExecutor({ gateway, suggestions, logger }),
    logger,
  });

  enterAlternateBuffer();
  onShutdown(() => exitAlternateBuffer());
  installSignalHandlers();

  const instance = render(<App controller={controller} />, { exitOnCtrlC: false });
  await instance.waitUntilExit();

  logger.info("Exiting");
  executeShutdownCleanup();
}

const program = new Command();

program
  .name("rewind")
  .description("Save checkpoints, browse history, roll back and sync a git working directory")
  .version(version)
  .option("--debug", "Write a debug log to debug.log in the working directory")
  .option("-C, --cwd <dir>", "Working directory (default: current directory)")
  .action(async (options: CliOptions) => {
    await run(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  try {
    executeShutdownCleanup();
  } finally {
    fail(error instanceof Error ? error.message : String(error));
  }
});
