// src/index.ts

export { PulseGenerator } from './controller.js';
export { Channel, BroadcastChannel, normalizeChannel, normalizePolarity } from './channel.js';
export { FrameSequencer } from './frame-sequencer.js';
export { CommandFramer, buildFrame, validateCommands } from './framers/command-framer.js';
export type { CommandFramerOptions } from './framers/command-framer.js';
export {
  computeTrainSpacing,
  computeTrainWindow,
  isIncludedInTrain,
  spacingToTicks,
  ticksToSpacing,
} from './train-timing.js';
export { decodeLoopCount, encodeLoopCount } from './commands/frame.js';
export { decodeTrainCount, encodeTrainCount } from './commands/train.js';
export { normalizeQuantity, parseQuantity, toHertz, toNanoseconds } from './utils/units.js';
export { default as NodeSerialTransport } from './transport/node-serialport.js';
export { default as PulseGeneratorEmulator, formatDeviceSeconds } from './emulator/pulse-generator-emulator.js';
export type { EmulatorState } from './emulator/pulse-generator-emulator.js';
export { default as Logger, pulsegenLogger } from './logger.js';
export * from './errors.js';
export * from './constants/constants.js';
export type * from './types/pulsegen-types.js';
