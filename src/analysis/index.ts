/**
 * Analysis Module Barrel Export
 */
export { VibrationAnalyzer, classifyZone, type VibrationSample, type ZoneClassification } from './VibrationAnalyzer';
export { AcousticLevelMeter, AWeightingCascade, rms, type AcousticReading } from './AcousticLevelMeter';
export { PhotonicAnalyzer, type PhotonicSample } from './PhotonicAnalyzer';
export { FrameRateMonitor } from './FrameRateMonitor';

// Fault forecasting and state
export {
  ThresholdDecayModel,
  GradientTrendModel,
  NO_FORECAST,
  DEFAULT_THRESHOLD_DECAY_CONFIG,
  DEFAULT_GRADIENT_TREND_CONFIG,
  type TtfModel,
  type FaultInputs,
  type ThresholdDecayConfig,
  type GradientTrendConfig,
} from './FaultPredictor';
export { classifyEngineState, type StateInputs } from './EngineStateClassifier';
