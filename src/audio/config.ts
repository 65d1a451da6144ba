/**
 * Synth configuration
 *
 * Values can be overridden via environment variables:
 *   SYNTH_SAMPLE_RATE=48000
 *   SYNTH_BUFFER_SIZE=256
 *   SYNTH_LEFTOVER_SAMPLES=16
 *
 * bufferSize and leftoverSampleCount size the pipeline around the synth.
 * The render loop only uses bufferSize to preallocate its scratch buffer.
 */

import {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_LEFTOVER_SAMPLE_COUNT,
  DEFAULT_SAMPLE_RATE,
} from './constants';

export interface SynthConfig {
  /** The sample rate of the audio stream, in Hz */
  readonly sampleRate: number;
  /** The number of samples per buffer */
  readonly bufferSize: number;
  /** The number of samples copied from the previous buffer to the next */
  readonly leftoverSampleCount: number;
}

export const DEFAULT_CONFIG: SynthConfig = {
  sampleRate: DEFAULT_SAMPLE_RATE,
  bufferSize: DEFAULT_BUFFER_SIZE,
  leftoverSampleCount: DEFAULT_LEFTOVER_SAMPLE_COUNT,
};

/**
 * Throws a RangeError if the configuration cannot drive a render loop.
 */
export function validateConfig(config: SynthConfig): void {
  const { sampleRate, bufferSize, leftoverSampleCount } = config;

  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new RangeError(`sampleRate must be a positive number, got ${sampleRate}`);
  }
  if (!Number.isSafeInteger(bufferSize) || bufferSize <= 0) {
    throw new RangeError(`bufferSize must be a positive integer, got ${bufferSize}`);
  }
  if (
    !Number.isSafeInteger(leftoverSampleCount) ||
    leftoverSampleCount < 0 ||
    leftoverSampleCount >= bufferSize
  ) {
    throw new RangeError(
      `leftoverSampleCount must be an integer in [0, ${bufferSize}), got ${leftoverSampleCount}`
    );
  }
}

/**
 * Merge overrides over the defaults and validate the result
 */
export function createConfig(overrides: Partial<SynthConfig> = {}): SynthConfig {
  const config: SynthConfig = { ...DEFAULT_CONFIG, ...overrides };
  validateConfig(config);
  return config;
}

/**
 * Parse a numeric environment variable
 * Returns defaultValue if not set, throws if set to something that is not a number
 */
function parseEnvNumber(name: string, value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new RangeError(`${name} must be numeric, got "${value}"`);
  }
  return parsed;
}

/**
 * Build a config from SYNTH_* environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SynthConfig {
  return createConfig({
    sampleRate: parseEnvNumber('SYNTH_SAMPLE_RATE', env.SYNTH_SAMPLE_RATE, DEFAULT_SAMPLE_RATE),
    bufferSize: parseEnvNumber('SYNTH_BUFFER_SIZE', env.SYNTH_BUFFER_SIZE, DEFAULT_BUFFER_SIZE),
    leftoverSampleCount: parseEnvNumber(
      'SYNTH_LEFTOVER_SAMPLES',
      env.SYNTH_LEFTOVER_SAMPLES,
      DEFAULT_LEFTOVER_SAMPLE_COUNT
    ),
  });
}
