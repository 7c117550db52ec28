/**
 * @transcode-mirror/core
 *
 * Core package containing:
 * - Media item, action and encoding types
 * - Reconciliation decision table
 * - Error taxonomy
 */

// Decision table
export {
  decide,
  isDispatchable,
  emptyClassificationCounts,
  countClassifications,
} from './stateMachine.js';

export type {
  Decision,
  DecisionAction,
  DecisionInput,
} from './stateMachine.js';

// Types
export { fingerprintOf } from './types/media.js';

export type {
  Classification,
  ResolutionVerdict,
  ActionKind,
  TreeSide,
  FileObservation,
  MediaItem,
  ActionRecord,
  ActionStatus,
  ActionOutcome,
  TreeEvent,
  TreeSnapshot,
  ClassificationCounts,
} from './types/media.js';

export {
  HW_ENCODING_TYPES,
  ENCODING_QUALITIES,
  ENCODING_CODECS,
  createEncodeOptions,
} from './types/encoding.js';

export type {
  EncodeOptions,
  HwEncodingType,
  EncodingQuality,
  EncodingCodec,
} from './types/encoding.js';

// Errors
export {
  TranscodeMirrorError,
  ProbeError,
  EncodeError,
  FilesystemError,
  ConfigurationError,
  CommandExecutionError,
  isTransientError,
  type FilesystemOperation,
} from './errors/index.js';
