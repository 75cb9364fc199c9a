export * from './errors/index.js';
export {
  getErrorMessage,
  hasStringProperty,
  isErrorWithMessage,
  isObject,
  toError,
  wrapError,
} from './utils/type-guard-utils.js';
export { parseOptions } from './utils/options.js';
export { fromSafeFileName, isMissingFileError, toSafeFileName } from './utils/file-names.js';
export { abortReason, anySignal, raceAgainstSignal, sleep } from './utils/abort.js';
export { KeyedLock } from './concurrency/keyed-lock.js';
export { DomainEvent, type DomainEventInit, type EventClass, type EventMetadataPatch } from './events/domain-event.js';
export {
  canonicalJson,
  computeEventHash,
  EventRecordSchema,
  type EventRecord,
} from './events/event-record.js';
export { EventTypeRegistry } from './events/event-type-registry.js';
