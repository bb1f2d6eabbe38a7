// src/train-timing.ts

import { TRAIN } from './constants/constants.js';
import { PulseGenPreconditionError, PulseGenRangeError } from './errors.js';
import { ChannelSettings, TrainSpacing, TrainWindow } from './types/pulsegen-types.js';

const MAX_SPACING_TICKS = TRAIN.MAX_SPACING_NS / TRAIN.TICK_NS;

/**
 * A channel repeats in the train when it is enabled and its delay is at
 * least 20 ns. Setting a shorter delay is how a single channel opts out.
 */
export function isIncludedInTrain(channel: Readonly<ChannelSettings>): boolean {
  return channel.enabled && channel.delayNs >= TRAIN.MIN_DELAY_NS;
}

/**
 * Computes the first-rise to last-fall window of the included channels and
 * the minimum pulse spacing it implies (window + 80 ns).
 * @throws PulseGenPreconditionError when no channel is included
 */
export function computeTrainWindow(channels: readonly Readonly<ChannelSettings>[]): TrainWindow {
  const included = channels.filter(isIncludedInTrain);
  if (included.length === 0) {
    throw new PulseGenPreconditionError(
      `Train spacing needs at least one enabled channel with a delay of ${TRAIN.MIN_DELAY_NS} ns or more`
    );
  }

  const windowStartNs = Math.min(...included.map(ch => ch.delayNs));
  const windowEndNs = Math.max(...included.map(ch => ch.delayNs + ch.widthNs));

  return {
    included: included.map(ch => ch.id),
    windowStartNs,
    windowEndNs,
    minSpacingNs: windowEndNs - windowStartNs + TRAIN.GUARD_NS,
  };
}

/**
 * Quantizes a spacing to 20 ns ticks, rounding to the nearest tick. A result
 * that would land below `floorNs` moves up to the next tick.
 */
export function spacingToTicks(spacingNs: number, floorNs: number = 0): number {
  let ticks = Math.round(spacingNs / TRAIN.TICK_NS);
  if (ticks * TRAIN.TICK_NS < floorNs) {
    ticks = Math.ceil(floorNs / TRAIN.TICK_NS);
  }
  return Math.min(Math.max(ticks, 1), MAX_SPACING_TICKS);
}

export function ticksToSpacing(ticks: number): number {
  return ticks * TRAIN.TICK_NS;
}

/**
 * @throws PulseGenRangeError for a negative or non-finite spacing
 */
export function validateRequestedSpacing(requestedNs: number): void {
  if (!Number.isFinite(requestedNs) || requestedNs < 0) {
    throw new PulseGenRangeError(`Train spacing must be a non-negative time, got ${requestedNs} ns`);
  }
}

/**
 * Derives the spacing register value for a requested spacing. Requests
 * below the minimum are raised to it and requests above 10 s are clamped.
 * @throws PulseGenRangeError for a negative or non-finite request, or a
 *   window too long to fit under the 10 s ceiling
 * @throws PulseGenPreconditionError when no channel is included
 */
export function computeTrainSpacing(
  channels: readonly Readonly<ChannelSettings>[],
  requestedNs: number
): TrainSpacing {
  validateRequestedSpacing(requestedNs);

  const window = computeTrainWindow(channels);
  if (window.minSpacingNs > TRAIN.MAX_SPACING_NS) {
    throw new PulseGenRangeError(
      `Minimum train spacing ${window.minSpacingNs} ns exceeds the ${TRAIN.MAX_SPACING_NS} ns ceiling`
    );
  }

  const clampedNs = Math.min(Math.max(requestedNs, window.minSpacingNs), TRAIN.MAX_SPACING_NS);
  const ticks = spacingToTicks(clampedNs, window.minSpacingNs);

  return {
    ...window,
    requestedNs,
    effectiveNs: ticksToSpacing(ticks),
    ticks,
  };
}
