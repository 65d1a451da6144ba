/**
 * Polyphonic synth core
 *
 * Renders notes built from one oscillator and one envelope into caller-owned
 * Float32Array buffers.
 */

export * from './audio';
export { createLogger, logger, type Logger } from './utils/logger';
