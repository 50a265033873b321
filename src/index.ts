/**
 * logtree: structured, hierarchical logging core.
 * Loggers carry inherited key/value context and route records through composable drains.
 */

export { Logger, createLogger, type CreateLoggerOptions } from './logger';
export { ContextChain, o, type ContextGroup, type ContextObject } from './context';
export {
  LogRecord,
  callSite,
  kv,
  UNKNOWN_CALL_SITE,
  type CallData,
  type CallSite,
  type Message,
} from './record';
export {
  Level,
  FilterLevel,
  levelAsOrdinal,
  filterLevelAsOrdinal,
  levelFromOrdinal,
  filterLevelFromOrdinal,
  toFilterLevel,
  isLevelEnabled,
  levelName,
  filterLevelName,
  levelShortName,
  parseLevel,
  parseFilterLevel,
  tryParseLevel,
  tryParseFilterLevel,
} from './level';
export {
  serializeValue,
  serializeKeyValue,
  lazy,
  pushLazy,
  PushLazy,
  ValueSerializer,
  type Serializer,
  type Serialize,
  type Value,
  type Primitive,
  type Lazy,
  type PushLazyFn,
  type OwnedValue,
  type BorrowedKeyValue,
  type OwnedKeyValue,
} from './ser';
export {
  Discard,
  Filter,
  LevelFilter,
  MapError,
  IgnoreErrors,
  Fuse,
  Duplicate,
  AtomicSwitch,
  AtomicSwitchCtrl,
  Exclusive,
  discard,
  filter,
  filterLevel,
  mapError,
  ignoreErrors,
  fuse,
  duplicate,
  atomicSwitch,
  exclusive,
  type Drain,
  type DrainError,
  type RecordPredicate,
} from './drain';
export { OK, fail, type Result } from './result';
export {
  STATIC_MAX_LEVEL,
  STATIC_LEVEL_FEATURES,
  RELEASE_LEVEL_FEATURES,
  resolveStaticMaxLevel,
  resolveFilterLevel,
  parseFeatures,
  type Env,
  type LevelFeature,
  type ResolveFilterLevelOptions,
} from './config';
export {
  LogTreeError,
  InvalidLevelNameError,
  DrainFusedError,
  DrainBusyError,
  ValueAlreadySerializedError,
  errorMessage,
} from './errors';
export { MemoryDrain, CollectingSerializer, type CapturedRecord, type CollectedPair, type CollectedValue } from './sinks';

// Default export
import { createLogger, Logger } from './logger';
import { Level } from './level';

export default {
  createLogger,
  Logger,
  Level,
};
