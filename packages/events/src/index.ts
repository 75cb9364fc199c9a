export {
  resolveHandler,
  type EventHandler,
  type EventHandlerFn,
  type EventMetadata,
  type HandlerContext,
  type HandlerResult,
  type ResolvedHandler,
} from './handlers/event-handler.js';
export {
  EventPriority,
  matchesTopic,
  type SubscribeOptions,
  type Subscription,
} from './bus/subscription.js';
export {
  EventBus,
  type EventBusOptions,
  type HandlerOutcome,
  type PublishOptions,
  type PublishOutcome,
  type UnsubscribeFilters,
} from './bus/event-bus.js';

export { composePipeline, type EventMiddleware, type MiddlewareContext, type NextFn } from './middleware/pipeline.js';
export { RetryMiddleware, type RetryMiddlewareOptions } from './middleware/retry-middleware.js';
export {
  CircuitBreakerMiddleware,
  type CircuitBreakerMiddlewareOptions,
} from './middleware/circuit-breaker-middleware.js';
export {
  MetricsMiddleware,
  MetricsOptionsSchema,
  type HandlerMetrics,
  type HandlerMetricsSummary,
  type MetricsMiddlewareOptions,
} from './middleware/metrics-middleware.js';
export { LoggingMiddleware, type LoggingMiddlewareOptions } from './middleware/logging-middleware.js';
export { TimeoutMiddleware, type TimeoutMiddlewareOptions } from './middleware/timeout-middleware.js';

export { EventPublisher, type EventPublisherOptions, type EventPublishReport } from './publisher/event-publisher.js';

export { AggregateRoot } from './aggregates/aggregate-root.js';
export {
  EventSourcedRepository,
  type AggregateFactory,
  type EventSourcedRepositoryOptions,
  type LoadError,
  type SnapshotSettings,
} from './aggregates/event-sourced-repository.js';

export {
  createEventSystem,
  getEventSystem,
  initEventSystem,
  resetEventSystem,
  type EventSystem,
  type EventSystemOptions,
} from './compose/event-system.js';
