// Byte-buffer helpers shared by the content reconciler.
export { trimBytes, bytesEqual, decodeBase64Lines };

const TAB = 0x09;
const SPACE = 0x20;

function isHorizontalSpace(byte: number): boolean {
  return byte === TAB || byte === SPACE;
}

/**
 * Strip leading and trailing tabs and spaces. Newlines and every other
 * control byte are content.
 */
function trimBytes(bytes: Uint8Array): Uint8Array {
  let first = 0;
  while (first < bytes.length && isHorizontalSpace(bytes[first] ?? 0)) first++;
  if (first === bytes.length) return new Uint8Array(0);
  let last = bytes.length - 1;
  while (last > first && isHorizontalSpace(bytes[last] ?? 0)) last--;
  return bytes.slice(first, last + 1);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  return Buffer.compare(a, b) === 0;
}

// GitHub wraps blob payloads at 60 columns.
function decodeBase64Lines(content: string): Uint8Array {
  return new Uint8Array(Buffer.from(content.replace(/\n/g, ''), 'base64'));
}
