/**
 * @clipset/core
 * 
 * Core building blocks shared by the export server and the CLI:
 * - Error taxonomy
 * - Binary resolution
 * - Export settings store
 * - Label registry
 * - Undo stack
 */

// Errors
export {
  ClipsetError,
  ValidationError,
  NotFoundError,
  SourceMissingError,
  InvalidWindowError,
  TranscodeFailedError,
  VerificationFailedError,
  ReplaceFailedError,
  type AttemptDiagnostics,
} from './errors/index.js';

// Binaries
export {
  resolveBinary,
  resolveBinaries,
  defaultUserBinDir,
  type BinaryConfig,
  type BinariesConfig,
  type ResolveOptions,
} from './config/binaries.js';

// Settings
export {
  SettingsStore,
  TRAINING_DIR,
  clipModeSchema,
  exportSettingsSchema,
  settingsUpdateSchema,
  defaultSettings,
  trainingRoot,
  type ClipMode,
  type ExportSettings,
  type SettingsUpdate,
} from './settings.js';

// Labels
export { LabelRegistry } from './labels.js';

// Undo
export { UndoStack, UNDO_CAPACITY } from './undoStack.js';
