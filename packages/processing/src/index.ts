/**
 * @clipset/processing
 * 
 * Clip cutting and dataset normalization.
 * 
 * RULES:
 * - Output is written to a temp file and renamed into place
 * - Every ffmpeg attempt is logged, failed ladders in full
 * - Nothing is re-encoded when a remux keeps the file in profile
 */

// Command Builder
export {
  FFmpegCommandBuilder,
  EVEN_DIMENSIONS_FILTER,
  baseCommand,
  createDecodeCheckCommand,
  type InputOptions,
  type VideoCodecOptions,
  type AudioCodecOptions,
} from './commandBuilder.js';

// Presets
export {
  streamCopyArgs,
  remuxArgs,
  encodeArgs,
  targetAudio,
  type AudioHandling,
  type EncodeInput,
  type EncoderKind,
} from './presets.js';

// Ladder
export { runLadder, type LadderRung, type LadderResult, type AttemptResult, type AttemptRunner } from './ladder.js';

// Transcoder
export {
  TranscodeExecutor,
  DEFAULT_BACKUP_SUFFIX,
  tempPathFor,
  isTempArtifact,
  replaceWithBackup,
  formatDiagnostics,
  type TranscodeExecutorOptions,
  type CutOptions,
  type NormalizeOptions,
} from './transcoder.js';

// Clip planning
export { planClip, assertValidWindow, type ClipPlanInput } from './clipPlanner.js';

// Export workflow
export {
  ClipExporter,
  type ClipExporterOptions,
  type ExportRequest,
  type ExportResult,
  type UndoResult,
} from './exporter.js';

// Dataset
export {
  listDatasetFiles,
  scanDataset,
  summarizeCounts,
  labelProgress,
  collectDatasetStats,
  type DatasetFile,
  type DatasetSummary,
  type DatasetStats,
  type LabelProgress,
  type LabelStatus,
} from './dataset.js';

// Repair
export {
  DatasetRepair,
  type RepairOptions,
  type RepairReport,
  type RepairItem,
  type RepairItemStatus,
  type RepairEvents,
} from './repair.js';

// Types
export type {
  Strategy,
  ClipWindow,
  TranscodeError,
  TranscodeFailure,
  CutSuccess,
  CutOutcome,
  NormalizeSuccess,
  NormalizeOutcome,
  NormalizationPlan,
} from './types.js';
