/** Raised at a page boundary once the run has been asked to stop. */
export class CancellationError extends Error {
  constructor(message = "Harvest cancelled") {
    super(message)
    this.name = "CancellationError"
  }
}

const reasonMessage = (reason: unknown): string | undefined => {
  if (reason instanceof Error) {
    return reason.message
  }
  if (typeof reason === "string" && reason.trim()) {
    return reason
  }
  return undefined
}

export const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (signal?.aborted) {
    throw new CancellationError(reasonMessage(signal.reason))
  }
}

export const isCancellationError = (value: unknown): boolean =>
  value instanceof CancellationError || (value instanceof Error && value.name === "AbortError")
