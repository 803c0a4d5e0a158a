/**
 * fieldscope - handheld vibration, acoustic, light and tilt diagnostics.
 */

export * from "./engine";
export * from "./analysis";
export { MeasurementSession, type SessionOptions } from "./session/MeasurementSession";

export { OrientationFuser, accelOffsetFromRest, type OrientationSample } from "./lib/fusion/OrientationFuser";
export { remapForDisplay, STANDARD_GRAVITY } from "./lib/math/conventions";
export {
  SpectralAnalyzer,
  SpectralTransform,
  hannWindow,
  spectralEntropy,
  type SpectralSnapshot,
} from "./lib/signal/SignalProcessor";
export { labelFrequency, isMainsFrequency, type FrequencyBand, type FrequencyLabel } from "./lib/signal/frequencyLabels";
export { RingBuffer } from "./lib/buffers/RingBuffer";

export { AudioMailbox, type SharedAudioSlot } from "./lib/audio/AudioMailbox";
export {
  AudioCapturePipeline,
  SYSTEM_CLOCK,
  type AudioSource,
  type CaptureClock,
  type CaptureConfig,
  type CaptureStatus,
} from "./lib/audio/AudioCapturePipeline";

export {
  EcoController,
  DEFAULT_ECO_CONFIG,
  type EcoConfig,
  type EcoTransition,
  type ThermalChange,
} from "./lib/power/EcoController";
export { SCAN_MODES, DEFAULT_SCAN_MODE, MIN_SAMPLE_RATE_HZ, getScanMode, type ScanMode, type ScanModeId, type CaptureBurst } from "./lib/constants/ScanModes";

export { createCalibrationStore, NEUTRAL_CALIBRATION, type CalibrationStore, type CalibrationState } from "./store/calibrationStore";
export { createPowerStore, type PowerStore, type PowerState, type EcoState } from "./store/powerStore";

export { createLogger, type Logger } from "./lib/logger";
export { serializeResultsCsv, formatResultLine, RESULT_CSV_COLUMNS } from "./lib/export/resultCsv";
