/**
 * Structured logging for pipeline stages and MCP tool calls.
 *
 * Writes to stderr: the MCP server owns stdout for JSON-RPC, and the CLI
 * keeps stdout for command output.
 */

// ─── Types ──────────────────────────────────────────────

export type LogLevel = "info" | "warn" | "error" | "debug";

type Context = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  operation?: string;
  durationMs?: number;
  message: string;
  context?: Context;
}

/** Log lines bound to one named operation */
export interface OperationLog {
  readonly operation: string;
  info(message: string, context?: Context): void;
  warn(message: string, context?: Context): void;
  debug(message: string, context?: Context): void;
}

/** Operations slower than this get a warning line */
export const SLOW_OPERATION_MS = 1000;

// ─── Output ─────────────────────────────────────────────

function write(entry: LogEntry): void {
  if (entry.level === "debug" && !process.env.TAG_SCOUT_DEBUG) return;

  const parts = [new Date().toISOString(), entry.level.toUpperCase().padEnd(5)];
  if (entry.operation) parts.push(`[${entry.operation}]`);
  parts.push(entry.message);
  if (entry.durationMs !== undefined) parts.push(`(${entry.durationMs}ms)`);
  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }
  console.error(parts.join(" "));
}

export function log(level: LogLevel, message: string, context?: Context): void {
  write({ level, message, context });
}

export function operationLog(operation: string): OperationLog {
  return {
    operation,
    info: (message, context) => write({ level: "info", operation, message, context }),
    warn: (message, context) => write({ level: "warn", operation, message, context }),
    debug: (message, context) => write({ level: "debug", operation, message, context }),
  };
}

// ─── Operation Metrics ──────────────────────────────────

export interface OperationMetrics {
  calls: number;
  errors: number;
  totalMs: number;
  avgMs: number;
  lastCallAt: string | null;
  /** Message of the most recent failure, kept after later successes */
  lastError: string | null;
}

const metrics = new Map<string, OperationMetrics>();

export function recordOperation(operation: string, durationMs: number, error?: string): void {
  const prev = metrics.get(operation);
  const calls = (prev?.calls ?? 0) + 1;
  const totalMs = (prev?.totalMs ?? 0) + durationMs;
  metrics.set(operation, {
    calls,
    errors: (prev?.errors ?? 0) + (error === undefined ? 0 : 1),
    totalMs,
    avgMs: Math.round(totalMs / calls),
    lastCallAt: new Date().toISOString(),
    lastError: error ?? prev?.lastError ?? null,
  });
}

export function getOperationMetrics(): Record<string, OperationMetrics> {
  return Object.fromEntries([...metrics].map(([operation, m]) => [operation, { ...m }]));
}

export function resetOperationMetrics(): void {
  metrics.clear();
}

/**
 * Run an operation with timing, metrics and failure logging. The callback
 * gets a log bound to the operation name; its result and any error pass
 * through unchanged.
 */
export async function withLogging<T>(
  operation: string,
  fn: (log: OperationLog) => Promise<T>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn(operationLog(operation));
    const durationMs = Date.now() - start;
    recordOperation(operation, durationMs);
    if (durationMs > SLOW_OPERATION_MS) {
      write({ level: "warn", operation, message: "slow execution", durationMs });
    }
    return result;
  } catch (error) {
    const durationMs = Date.now() - start;
    const message = error instanceof Error ? error.message : String(error);
    recordOperation(operation, durationMs, message);
    write({ level: "error", operation, message, durationMs });
    throw error;
  }
}
