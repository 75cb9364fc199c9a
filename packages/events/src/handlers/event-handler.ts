import { getErrorMessage, HandlerError, isKindedError, type DomainEvent, type EventClass } from '@eventide/core';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

export type HandlerResult = Result<unknown, Error>;

export type EventMetadata = Readonly<Record<string, unknown>>;

/**
 * What a handler sees besides the event. `signal` aborts when a timeout or
 * the caller cancels the dispatch.
 */
export interface HandlerContext {
  readonly metadata: EventMetadata;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Object-style handler. `canHandle` narrows what the handler accepts beyond
 * its `eventClass` (default: any instance of that class).
 */
export interface EventHandler<TEvent extends DomainEvent = DomainEvent> {
  readonly name?: string | undefined;
  readonly eventClass?: EventClass<TEvent> | undefined;
  handle(event: TEvent, context: HandlerContext): Promise<HandlerResult> | HandlerResult;
  canHandle?(event: DomainEvent): boolean;
}

export type EventHandlerFn<TEvent extends DomainEvent = DomainEvent> = (
  event: TEvent,
  context: HandlerContext
) => Promise<HandlerResult> | HandlerResult;

/**
 * A handler normalized once at subscription time, so dispatch never has to
 * inspect its shape again.
 */
export interface ResolvedHandler {
  readonly kind: 'object' | 'function';
  /** The handler as passed to subscribe; used to find it again on unsubscribe. */
  readonly ref: object;
  readonly name: string;
  readonly eventClass: EventClass | undefined;
  accepts(event: DomainEvent): boolean;
  invoke(event: DomainEvent, context: HandlerContext): Promise<HandlerResult>;
}

function isEventHandlerObject<TEvent extends DomainEvent>(
  handler: EventHandler<TEvent> | EventHandlerFn<TEvent>
): handler is EventHandler<TEvent> {
  return typeof handler === 'object';
}

function instanceGuard<TEvent extends DomainEvent>(
  eventClass: EventClass<TEvent> | undefined
): (event: DomainEvent) => event is TEvent {
  return (event): event is TEvent => eventClass === undefined || event instanceof eventClass;
}

/**
 * Run a handler call, turning a thrown exception into a failed result. A
 * KindedError keeps its kind so retry and circuit policies can classify it.
 */
async function guardedCall(name: string, call: () => Promise<HandlerResult> | HandlerResult): Promise<HandlerResult> {
  try {
    return await call();
  } catch (error) {
    if (isKindedError(error)) {
      return err(error);
    }
    return err(new HandlerError(`Handler ${name} threw: ${getErrorMessage(error)}`, name, { cause: error }));
  }
}

function rejectEvent(name: string, event: DomainEvent): HandlerResult {
  return err(new HandlerError(`Handler ${name} cannot handle ${event.eventType}`, name));
}

export function resolveHandler<TEvent extends DomainEvent>(
  handler: EventHandler<TEvent> | EventHandlerFn<TEvent>,
  eventClass?: EventClass<TEvent>
): ResolvedHandler {
  if (isEventHandlerObject(handler)) {
    const effectiveClass = eventClass ?? handler.eventClass;
    const isTarget = instanceGuard(effectiveClass);
    const name = handler.name ?? handler.constructor.name;
    return {
      kind: 'object',
      ref: handler,
      name,
      eventClass: effectiveClass,
      accepts: (event) => isTarget(event) && (handler.canHandle?.(event) ?? true),
      invoke: (event, context) => {
        if (!isTarget(event)) return Promise.resolve(rejectEvent(name, event));
        const target = event;
        return guardedCall(name, () => handler.handle(target, context));
      },
    };
  }

  const isTarget = instanceGuard(eventClass);
  const name = handler.name || 'anonymous';
  return {
    kind: 'function',
    ref: handler,
    name,
    eventClass,
    accepts: isTarget,
    invoke: (event, context) => {
      if (!isTarget(event)) return Promise.resolve(rejectEvent(name, event));
      const target = event;
      return guardedCall(name, () => handler(target, context));
    },
  };
}
