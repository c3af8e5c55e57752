/**
 * Where the library reports failures it recovers from.
 */
export interface DiagnosticSink {
  error(message: string, error: unknown): void
  warn(message: string, detail?: unknown): void
}

/**
 * Build a console-backed sink whose messages start with `[prefix]`.
 */
export function createDiagnostics(prefix: string): DiagnosticSink {
  return {
    error: (message, error) => {
      console.error(`[${prefix}] ${message}`, error)
    },
    warn: (message, detail) => {
      if (detail === undefined) {
        console.warn(`[${prefix}] ${message}`)
      } else {
        console.warn(`[${prefix}] ${message}`, detail)
      }
    }
  }
}

export const consoleDiagnostics: DiagnosticSink = createDiagnostics('treebind')
