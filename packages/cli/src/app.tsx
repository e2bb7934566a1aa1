import { useApp, useInput } from "ink";
import type React from "react";
import { useEffect, useSyncExternalStore } from "react";
import { Screen } from "./tui/components/Screen.js";
import type { Controller } from "./tui/runtime/index.js";
import { toKey } from "./tui/state/index.js";

export interface AppProps {
  readonly controller: Controller;
  /** Animate the loading spinner */
  readonly animate?: boolean;
}

/**
 * Connects the terminal to the controller: keys go in as events, every new
 * state is rendered, and the app unmounts once the state says it is quitting.
 */
export function App({ controller, animate = true }: AppProps): React.JSX.Element {
  const { exit } = useApp();
  const state = useSyncExternalStore(controller.subscribe, controller.getSnapshot);

  useEffect(() => {
    controller.start();
  }, [controller]);

  useEffect(() => {
    if (state.quitting) {
      exit();
    }
  }, [state.quitting, exit]);

  useInput((input, key) => {
    const mapped = toKey(input, key);
    if (mapped) {
      controller.dispatch({ type: "KEY_PRESSED", key: mapped });
    }
  });

  return <Screen state={state} animate={animate} />;
}
