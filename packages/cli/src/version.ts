/**
 * Version string shown by `rewind --version`.
 *
 * Bundles get it from package.json through the `__VERSION__` define in
 * tsup.config.ts; running from source reports a development version.
 */
declare const __VERSION__: string | undefined;

export const DEV_VERSION = "0.0.0-dev";

export const version: string = typeof __VERSION__ === "string" ? __VERSION__ : DEV_VERSION;
