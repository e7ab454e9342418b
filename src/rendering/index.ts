import type { HarvestLogger } from "../harvest/types.js"
import { InteractiveRenderer } from "./interactive.js"
import { PlainRenderer } from "./plain.js"
import type { CliRenderer } from "./types.js"

export * from "./types.js"

export const createRenderer = (mode: "interactive" | "plain"): CliRenderer => {
  if (mode === "plain") {
    return new PlainRenderer()
  }
  return new InteractiveRenderer()
}

/** Routes core warnings to the renderer; verbose lines only when enabled. */
export const createHarvestLogger = (
  renderer: CliRenderer,
  options: { verbose: boolean; startedAt: number },
): HarvestLogger => ({
  warn: (message) => renderer.warn(message),
  verbose: (scope, message) => {
    if (!options.verbose) {
      return
    }
    renderer.logVerbose(scope, message, (Date.now() - options.startedAt) / 1000)
  },
})
