import type { GatewayEvent } from "./types.js";

export type EventHandler = (event: GatewayEvent) => void | Promise<void>;

/**
 * Synchronous publish/subscribe for gateway lifecycle events.
 *
 * Handlers run in subscription order inside publish(). A handler that
 * throws, or returns a promise that rejects, is logged and skipped; the
 * failure never reaches the request pipeline.
 */
export class EventBus {
  private handlers: EventHandler[] = [];

  subscribe(handler: EventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  publish(event: GatewayEvent): void {
    for (const handler of this.handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => reportHandlerError(event, err));
        }
      } catch (err: unknown) {
        reportHandlerError(event, err);
      }
    }
  }

  get subscriberCount(): number {
    return this.handlers.length;
  }
}

function reportHandlerError(event: GatewayEvent, err: unknown): void {
  const msg = err instanceof Error ? err.message : String(err);
  console.warn(`[Bus] subscriber failed on ${event.type} (${event.requestId}): ${msg}`);
}

/** Turns gateway events into console lines. */
export function attachConsoleLog(bus: EventBus): () => void {
  return bus.subscribe((event) => {
    const id = event.requestId.slice(0, 8);
    switch (event.type) {
      case "ProviderCallSucceeded":
        console.log(`[Gateway] ${id} ${event.provider} answered with ${event.model} for ${event.cost.toFixed(4)}`);
        break;
      case "ProviderCallFailed":
        console.warn(`[Gateway] ${id} ${event.provider} failed: ${event.code} ${event.message}`);
        break;
      case "CircuitOpened":
        console.warn(`[Gateway] ${id} circuit opened for ${event.provider} (${event.failureCount} failures)`);
        break;
      case "CircuitClosed":
        console.log(`[Gateway] ${id} circuit closed for ${event.provider}`);
        break;
      case "BudgetExceeded":
        console.warn(
          `[Gateway] ${id} budget exceeded for ${event.principal}: ${event.spent.toFixed(4)}/${event.limit} + ${event.requested.toFixed(4)}`,
        );
        break;
      case "RequestCompleted":
        console.log(
          `[Gateway] ${id} done via ${event.provider}${event.cached ? " (cached)" : ""} in ${event.latencyMs}ms`,
        );
        break;
      case "RequestFailed":
        console.warn(`[Gateway] ${id} failed: ${event.code} ${event.message}`);
        break;
      default:
        break;
    }
  });
}
