// Helpers for the `event/resource/status/duration` fields use case logs carry.

export type ErrorPayload = {
  message: string
  kind: string
  stack?: string
}

export const msToNs = (ms: number): number => Math.round(ms * 1_000_000)

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof Error) {
    return {
      message: error.message,
      kind: error.constructor.name,
      stack: error.stack,
    }
  }
  return { message: String(error), kind: 'Error' }
}
