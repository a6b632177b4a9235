/**
 * Diagnostic stream for recoverable conditions.
 *
 * Engine code reports through a `Diagnostics` sink; only the CLI binds it to
 * stderr.
 */

export interface Diagnostics {
  warn(message: string): void;
}

export const stderrDiagnostics: Diagnostics = {
  warn(message: string): void {
    process.stderr.write(`warning: ${message}\n`);
  },
};

/** Sink that keeps every warning, in order. */
export function collectingDiagnostics(): Diagnostics & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    warn(message: string): void {
      warnings.push(message);
    },
  };
}
