import { ArqConfigError } from "./errors";
import {
  ARQ_STRATEGY,
  DEFAULT_CONFIG,
  type ArqConfig,
  type ArqStrategy,
} from "./types";

/**
 * Smallest sequence space in which old and new frames cannot alias
 * for the given strategy and window size.
 */
export function minimumSafeSequenceSpace(
  strategy: ArqStrategy,
  windowSize: number
): number {
  return strategy === ARQ_STRATEGY.SELECTIVE_REPEAT
    ? 2 * windowSize
    : windowSize + 1;
}

/**
 * Returns a warning for every setting that is accepted but unsafe.
 * Throws ArqConfigError for settings the state machines cannot run with.
 */
export function validateConfig(config: ArqConfig): string[] {
  const { windowSize, sequenceSpace, strategy } = config;

  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new ArqConfigError(`windowSize must be a positive integer, got ${windowSize}`);
  }
  if (!Number.isInteger(sequenceSpace) || sequenceSpace <= windowSize) {
    throw new ArqConfigError(
      `sequenceSpace must be an integer greater than windowSize (${windowSize}), got ${sequenceSpace}`
    );
  }
  if (!(config.retransmissionTimeout > 0)) {
    throw new ArqConfigError(
      `retransmissionTimeout must be positive, got ${config.retransmissionTimeout}`
    );
  }
  if (
    !Number.isInteger(config.maxRetransmissionAttempts) ||
    config.maxRetransmissionAttempts < 0
  ) {
    throw new ArqConfigError(
      `maxRetransmissionAttempts must be a non-negative integer, got ${config.maxRetransmissionAttempts}`
    );
  }
  if (
    strategy !== ARQ_STRATEGY.SELECTIVE_REPEAT &&
    strategy !== ARQ_STRATEGY.GO_BACK_N
  ) {
    throw new ArqConfigError(`Unknown strategy: ${String(strategy)}`);
  }
  if (config.checksum !== "additive" && config.checksum !== "crc32") {
    throw new ArqConfigError(`Unknown checksum algorithm: ${String(config.checksum)}`);
  }

  const warnings: string[] = [];
  const safe = minimumSafeSequenceSpace(strategy, windowSize);
  if (sequenceSpace < safe) {
    const message = `sequenceSpace ${sequenceSpace} is below ${safe} for ${strategy} with windowSize ${windowSize}; retransmitted old frames can be mistaken for new ones`;
    if (config.strictSequenceSpace) {
      throw new ArqConfigError(message);
    }
    warnings.push(message);
  }

  return warnings;
}

export function resolveConfig(overrides: Partial<ArqConfig> = {}): {
  config: ArqConfig;
  warnings: string[];
} {
  const config = { ...DEFAULT_CONFIG, ...overrides };
  const warnings = validateConfig(config);
  return { config, warnings };
}
