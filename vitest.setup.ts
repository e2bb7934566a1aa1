/**
 * Vitest Global Setup
 *
 * Keeps the environment of every test file free of settings that change
 * how Rewind loads configuration or talks to git.
 */
import { beforeEach } from "vitest";

declare global {
  var IS_REACT_ACT_ENVIRONMENT: boolean | undefined;
}

globalThis.IS_REACT_ACT_ENVIRONMENT = true;

process.stdout.setMaxListeners(0);
process.setMaxListeners(0);

const ISOLATED_ENV_VARS = ["DEBUG", "REWIND_DEBUG", "REWIND_LOG_LEVEL", "REWIND_REMOTE"] as const;

beforeEach(() => {
  for (const name of ISOLATED_ENV_VARS) {
    delete process.env[name];
  }
});
