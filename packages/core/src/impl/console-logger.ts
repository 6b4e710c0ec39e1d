import type { DispatchedEvent, EventDispatcher } from './event-dispatcher';

/** The subset of `console` the logger writes to. */
export interface LogSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = '[PlantGate]';

/**
 * Format one event as a single log line, with the sink level to write it at.
 * Returns undefined for events that are not worth a line (granted access,
 * attached contexts: one per request).
 */
export function formatEvent(e: DispatchedEvent): { level: keyof LogSink; line: string } | undefined {
  switch (e.type) {
    case 'pool.created':
      return { level: 'log', line: `${PREFIX} Pool ready for ${e.target} (${e.durationMs}ms)` };
    case 'pool.failed':
      return { level: 'error', line: `${PREFIX} ${e.operation} failed for ${e.target}: ${describe(e.error)}` };
    case 'pool.error':
      return { level: 'error', line: `${PREFIX} Idle client error on ${e.target}: ${e.message}` };
    case 'pools.closed':
      return { level: 'log', line: `${PREFIX} Closed ${e.count} pool(s)` };
    case 'access.denied':
      return { level: 'warn', line: `${PREFIX} Access denied: user ${e.userId} → plant ${e.plantId}` };
    case 'access.failed':
      return { level: 'error', line: `${PREFIX} ${e.operation} failed for plant ${e.plantId}: ${e.message}` };
    case 'request.rejected':
      return {
        level: 'warn',
        line: `${PREFIX} Rejected at ${e.state}: ${e.status} ${e.code}${e.plantId ? ` (plant ${e.plantId})` : ''}`,
      };
    case 'health.checked': {
      const unreachable = Array.isArray(e.unreachable) && e.unreachable.length > 0
        ? ` (unreachable: ${e.unreachable.join(', ')})`
        : '';
      return { level: e.status === 'healthy' ? 'log' : 'warn', line: `${PREFIX} Health ${e.status}${unreachable}` };
    }
    default:
      return undefined;
  }
}

function describe(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Write every event the dispatcher emits to the console.
 * Returns the unsubscribe function.
 */
export function attachConsoleLogger(dispatcher: EventDispatcher, sink: LogSink = console): () => void {
  return dispatcher.on('*', (e) => {
    const entry = formatEvent(e);
    if (entry) {
      sink[entry.level](entry.line);
    }
  });
}
