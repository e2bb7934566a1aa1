/**
 * Controller
 *
 * Owns the application state. Events are processed one at a time from a
 * queue; a command returned by the reducer is handed to the executor and
 * its single answering event re-enters the same queue.
 *
 * Exposes `subscribe`/`getSnapshot` for React's `useSyncExternalStore`.
 *
 * @module tui/runtime/controller
 */

import { ErrorCode, type Logger, RewindError } from "@rewind/core";
import {
  type AppEvent,
  type AppState,
  type Command,
  reduce,
  START_COMMAND,
} from "../state/index.js";
import type { Executor } from "./executor.js";

export interface ControllerOptions {
  readonly initialState: AppState;
  readonly execute: Executor;
  readonly logger?: Logger;
}

export class Controller {
  private state: AppState;
  private readonly execute: Executor;
  private readonly logger?: Logger;

  private readonly listeners = new Set<() => void>();
  private readonly queue: AppEvent[] = [];
  private readonly pending = new Set<Promise<void>>();
  private draining = false;
  private started = false;

  constructor(options: ControllerOptions) {
    this.state = options.initialState;
    this.execute = options.execute;
    this.logger = options.logger?.child({ component: "controller" });
  }

  /**
   * Issues the initial status load. Subsequent calls do nothing.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.run(START_COMMAND);
  }

  /**
   * Queues an event. Events dispatched while another is being reduced are
   * processed after it, in order.
   */
  dispatch(event: AppEvent): void {
    this.queue.push(event);
    this.drain();
  }

  getSnapshot = (): AppState => this.state;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Resolves once no command is in flight, including commands issued by
   * events that arrive while waiting.
   */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  private drain(): void {
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let event = this.queue.shift();
      while (event !== undefined) {
        this.apply(event);
        event = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private apply(event: AppEvent): void {
    if (event.type !== "KEY_PRESSED") {
      this.logger?.debug("Event", { type: event.type });
    }

    const { state, command } = reduce(this.state, event);
    if (state !== this.state) {
      this.state = state;
      for (const listener of this.listeners) {
        listener();
      }
    }
    if (command) {
      this.run(command);
    }
  }

  private run(command: Command): void {
    if (command.type === "QUIT") {
      // The view observes `quitting` and unmounts.
      this.logger?.debug("Quit requested");
      return;
    }

    const task = this.execute(command).then(
      (event) => this.dispatch(event),
      (error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger?.error("Executor rejected", { command: command.type, error: message });
        this.dispatch({
          type: "OPERATION_FAILED",
          operation: command.type,
          error: new RewindError(message, ErrorCode.INTERNAL_ERROR, { cause: error }),
        });
      }
    );
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }
}
