import type { EventEmitter } from "node:events";
import type { AppBridge, AppEvent, AppSnapshot, UiCommand } from "../shared/types.js";

export const APP_EVENT_CHANNEL = "app:event";

export interface BridgeController {
  init(): Promise<AppSnapshot>;
  dispatch(command: UiCommand): Promise<void>;
}

/** `init` runs once however often the renderer asks; later calls share the first result. */
export function createBridge(controller: BridgeController, events: EventEmitter): AppBridge {
  let initPromise: Promise<AppSnapshot> | null = null;

  return {
    init: async () => {
      if (!initPromise) {
        initPromise = controller.init();
      }
      return await initPromise;
    },
    dispatch: async (command) => {
      await controller.dispatch(command);
    },
    subscribe(listener) {
      const callback = (event: AppEvent): void => {
        listener(event);
      };

      events.on(APP_EVENT_CHANNEL, callback);
      return () => {
        events.off(APP_EVENT_CHANNEL, callback);
      };
    }
  };
}
