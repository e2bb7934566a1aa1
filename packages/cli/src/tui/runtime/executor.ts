/**
 * Command Executor
 *
 * Runs a command against the repository gateway and answers with exactly
 * one event. Never rejects: a thrown error becomes OPERATION_FAILED too.
 *
 * @module tui/runtime/executor
 */

import {
  ErrorCode,
  type Logger,
  type RepositoryGateway,
  RewindError,
  isRewindError,
} from "@rewind/core";
import type { AppEvent, Command } from "../state/index.js";

/**
 * Commands that do work. QUIT is handled by the controller itself.
 */
export type OperationCommand = Exclude<Command, { readonly type: "QUIT" }>;

export type Executor = (command: OperationCommand) => Promise<AppEvent>;

export interface ExecutorOptions {
  readonly gateway: RepositoryGateway;
  /** Offered in description entry */
  readonly suggestions: readonly string[];
  readonly logger?: Logger;
}

function failed(operation: OperationCommand["type"], error: RewindError): AppEvent {
  return { type: "OPERATION_FAILED", operation, error };
}

async function run(command: OperationCommand, options: ExecutorOptions): Promise<AppEvent> {
  const { gateway } = options;

  switch (command.type) {
    case "LOAD_STATUS": {
      const result = await gateway.loadStatus();
      return result.ok
        ? { type: "STATUS_LOADED", state: result.value }
        : failed(command.type, result.error);
    }

    case "PREPARE_DESCRIPTION":
      return { type: "DESCRIPTION_READY", suggestions: options.suggestions };

    case "CREATE_CHECKPOINT": {
      const result = await gateway.createCheckpoint(command.message);
      return result.ok
        ? { type: "CHECKPOINT_CREATED", result: result.value }
        : failed(command.type, result.error);
    }

    case "LOAD_HISTORY": {
      const result = await gateway.loadHistory();
      return result.ok
        ? { type: "HISTORY_LOADED", checkpoints: result.value, purpose: command.purpose }
        : failed(command.type, result.error);
    }

    case "ROLLBACK": {
      const result = await gateway.rollback(command.hash);
      return result.ok
        ? { type: "ROLLED_BACK", summary: result.value }
        : failed(command.type, result.error);
    }

    case "SYNC": {
      const result = await gateway.sync();
      return result.ok
        ? { type: "SYNC_COMPLETED", outcome: result.value }
        : failed(command.type, result.error);
    }

    case "INIT_REPOSITORY": {
      const result = await gateway.initRepository();
      return result.ok ? { type: "REPOSITORY_INITIALIZED" } : failed(command.type, result.error);
    }
  }
}

/**
 * Creates an executor bound to a gateway.
 *
 * @example
 * ```typescript
 * const execute = createExecutor({ gateway, suggestions: DEFAULT_SUGGESTIONS });
 * const event = await execute({ type: "LOAD_STATUS" });
 * ```
 */
export function createExecutor(options: ExecutorOptions): Executor {
  const logger = options.logger?.child({ component: "executor" });

  return async (command) => {
    logger?.debug("Running command", { command: command.type });
    try {
      const event = await run(command, options);
      if (event.type === "OPERATION_FAILED") {
        logger?.warn("Command failed", { command: command.type, error: event.error.toJSON() });
      }
      return event;
    } catch (thrown) {
      const error = isRewindError(thrown)
        ? thrown
        : new RewindError(
            thrown instanceof Error ? thrown.message : String(thrown),
            ErrorCode.INTERNAL_ERROR,
            { cause: thrown }
          );
      logger?.error("Command threw", { command: command.type, error: error.toJSON() });
      return failed(command.type, error);
    }
  };
}
