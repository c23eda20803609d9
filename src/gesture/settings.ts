import type {
  DragConfig,
  LongPressConfig,
  RecognizerConfigOverrides,
  RecognizerConfigs,
  TapConfig,
  WindowId,
} from './types';

export interface ScrollbarMetrics {
  width: number;
  margin: number;
  minThumb: number;
}

export interface GestureSettings {
  recognizers: RecognizerConfigs;
  /** Logical pixels scrolled per wheel tick. */
  wheelStepPx: number;
  scrollbar: ScrollbarMetrics;
  defaultWindow: WindowId;
  /** Log every executed effect with console.debug. */
  trace: boolean;
}

export interface GestureSettingsInput {
  recognizers?: RecognizerConfigOverrides;
  wheelStepPx?: number;
  scrollbar?: Partial<ScrollbarMetrics>;
  defaultWindow?: WindowId;
  trace?: boolean;
}

export const DEFAULT_WINDOW_ID: WindowId = 'primary';

export const DEFAULT_RECOGNIZER_CONFIGS: RecognizerConfigs = {
  drag: { minDistance: 10 },
  tap: { maxDistance: 10, maxDurationMs: 300 },
  longPress: { minDurationMs: 500, maxDistance: 10 },
};

export const DEFAULT_SCROLLBAR_METRICS: ScrollbarMetrics = {
  width: 6,
  margin: 2,
  minThumb: 20,
};

export const DEFAULT_GESTURE_SETTINGS: GestureSettings = {
  recognizers: DEFAULT_RECOGNIZER_CONFIGS,
  wheelStepPx: 20,
  scrollbar: DEFAULT_SCROLLBAR_METRICS,
  defaultWindow: DEFAULT_WINDOW_ID,
  trace: false,
};

function normalizeNonNegative(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
    return value;
  }
  return fallback;
}

function mergeDragConfig(base: DragConfig, partial: Partial<DragConfig> | undefined): DragConfig {
  return {
    minDistance: normalizeNonNegative(partial?.minDistance, base.minDistance),
  };
}

function mergeTapConfig(base: TapConfig, partial: Partial<TapConfig> | undefined): TapConfig {
  return {
    maxDistance: normalizeNonNegative(partial?.maxDistance, base.maxDistance),
    maxDurationMs: normalizeNonNegative(partial?.maxDurationMs, base.maxDurationMs),
  };
}

function mergeLongPressConfig(
  base: LongPressConfig,
  partial: Partial<LongPressConfig> | undefined
): LongPressConfig {
  return {
    minDurationMs: normalizeNonNegative(partial?.minDurationMs, base.minDurationMs),
    maxDistance: normalizeNonNegative(partial?.maxDistance, base.maxDistance),
  };
}

export function mergeRecognizerConfigs(
  base: RecognizerConfigs,
  overrides: RecognizerConfigOverrides | undefined
): RecognizerConfigs {
  if (!overrides) return base;
  return {
    drag: mergeDragConfig(base.drag, overrides.drag),
    tap: mergeTapConfig(base.tap, overrides.tap),
    longPress: mergeLongPressConfig(base.longPress, overrides.longPress),
  };
}

export function createGestureSettings(input: GestureSettingsInput = {}): GestureSettings {
  const defaults = DEFAULT_GESTURE_SETTINGS;
  const scrollbar = input.scrollbar;

  return {
    recognizers: mergeRecognizerConfigs(defaults.recognizers, input.recognizers),
    wheelStepPx: normalizeNonNegative(input.wheelStepPx, defaults.wheelStepPx),
    scrollbar: {
      width: normalizeNonNegative(scrollbar?.width, defaults.scrollbar.width),
      margin: normalizeNonNegative(scrollbar?.margin, defaults.scrollbar.margin),
      minThumb: normalizeNonNegative(scrollbar?.minThumb, defaults.scrollbar.minThumb),
    },
    defaultWindow:
      typeof input.defaultWindow === 'string' && input.defaultWindow.trim().length > 0
        ? input.defaultWindow
        : defaults.defaultWindow,
    trace: typeof input.trace === 'boolean' ? input.trace : defaults.trace,
  };
}
