/**
 * @subburn/core
 *
 * Core package containing:
 * - Pipeline state machine
 * - Fallback ladder
 * - Error classes
 * - Settings and binary configuration
 */

// State machine
export {
  PIPELINE_STAGES,
  WORKING_STAGES,
  PipelineStateMachine,
  isValidTransition,
  getNextStates,
  stageIndex,
} from './stateMachine.js';

export type {
  PipelineStage,
  WorkingStage,
  StageTransition,
} from './stateMachine.js';

// Fallback ladder
export { runFallbackLadder } from './fallback.js';

export type {
  Strategy,
  StrategyOutcome,
  StrategyAttempt,
  LadderResult,
  LadderOptions,
} from './fallback.js';

// Errors
export {
  SubburnError,
  ProbeError,
  ExtractError,
  UnsupportedSubtitleFormatError,
  TransformError,
  EncodeFailedError,
  CancelledError,
  StateTransitionError,
  InvalidInputError,
  InvalidSelectionError,
  ConfigError,
  toSubburnError,
} from './errors/index.js';

// Settings
export {
  AUDIO_CODEC,
  DEFAULT_SETTINGS,
  SETTINGS_SECTIONS,
  getSettingsPath,
  getSettingValue,
  loadSettings,
  saveSettings,
  updateSetting,
  resetSettings,
  normalizeSettings,
  toConversionSettings,
  type SettingsFile,
  type SettingsSection,
  type ConversionSettings,
  type SubtitleFontSettings,
  type NormalizeResult,
} from './config/settings.js';

// Binary Configuration
export {
  getBinariesConfig,
  binaries,
  getBinaryPath,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/binaries.js';
