// src/utils/utils.ts

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Returns a view over part of the input array (shared buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

export function allocUint8Array(size: number): Uint8Array {
  return new Uint8Array(size);
}

/**
 * Encodes text one byte per character. Characters above 0x7f are rejected
 * since the device speaks plain ASCII.
 */
export function asciiToBytes(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0x7f) {
      throw new TypeError(`Non-ASCII character at ${i} in "${text}"`);
    }
    bytes[i] = code;
  }
  return bytes;
}

export function bytesToAscii(bytes: Uint8Array): string {
  let text = '';
  for (const byte of bytes) text += String.fromCharCode(byte);
  return text;
}

/**
 * Makes control characters visible for log output.
 */
export function escapeControl(text: string): string {
  return text.replace(/\r/g, '\\r').replace(/\n/g, '\\n');
}

/**
 * Formats a number the way the device expects fixed-point arguments.
 */
export function toFixedArg(value: number): string {
  return value.toFixed(6);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
