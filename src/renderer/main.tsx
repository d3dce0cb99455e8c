import { render, type Instance } from "ink";
import type { AppBridge } from "../shared/types.js";
import { App } from "./App.js";

/** Ctrl+C opens the playlist-name popup, so ink must not treat it as an interrupt. */
export function mountApp(api: AppBridge): Instance {
  return render(<App api={api} />, { exitOnCtrlC: false });
}
