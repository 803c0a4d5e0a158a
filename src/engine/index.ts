/**
 * Engine Module Barrel Export
 */
export { DiagnosticEngine } from './DiagnosticEngine';
export {
  createEngineContext,
  processFrame,
  type EngineContext,
  type EngineContextOptions,
  type ProcessFrameOptions,
} from './EngineContext';
export {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  validateEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
  type OrientationConfig,
  type VibrationConfig,
  type SpectralConfig,
  type AcousticConfig,
  type PhotonicConfig,
  type ClassifierConfig,
  type RateConfig,
  type ZoneThresholds,
} from './config';
export type * from './types';
