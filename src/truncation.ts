/**
 * Byte-bounded truncation for text that is fed back into model prompts.
 *
 * - 50/50 split (first half + last half)
 * - Marker at the cut point: [···TRUNCATED N bytes···]
 * - Cuts only on UTF-8 character boundaries
 */

// Worst-case marker: [···TRUNCATED 9999999999 bytes···] ≈ 34 bytes
const MARKER_OVERHEAD = 50;

const MIDDLE_DOT = '·';

export function buildTruncationMarker(omittedCount: number, unit: string): string {
  return `[${MIDDLE_DOT}${MIDDLE_DOT}${MIDDLE_DOT}TRUNCATED ${String(omittedCount)} ${unit}${MIDDLE_DOT}${MIDDLE_DOT}${MIDDLE_DOT}]`;
}

/**
 * Find a safe UTF-8 byte boundary at or before the given byte offset.
 */
function findSafeUtf8Boundary(buffer: Buffer, targetOffset: number): number {
  if (targetOffset >= buffer.length) return buffer.length;
  if (targetOffset <= 0) return 0;

  let offset = targetOffset;
  // continuation bytes are 10xxxxxx
  while (offset > 0 && (buffer[offset] & 0xc0) === 0x80) {
    offset--;
  }
  return offset;
}

/**
 * Find a safe UTF-8 byte boundary at or after the given byte offset.
 */
function findSafeUtf8BoundaryAfter(buffer: Buffer, targetOffset: number): number {
  if (targetOffset >= buffer.length) return buffer.length;
  if (targetOffset <= 0) return 0;

  let offset = targetOffset;
  while (offset < buffer.length && (buffer[offset] & 0xc0) === 0x80) {
    offset++;
  }
  return offset;
}

/**
 * Truncate a string to at most `targetBytes` UTF-8 bytes, keeping its head and tail.
 *
 * @returns the payload unchanged when it fits, otherwise the cut payload;
 *          `undefined` when the target cannot even hold the marker
 */
export function truncateToBytes(payload: string, targetBytes: number): string | undefined {
  const buffer = Buffer.from(payload, 'utf8');
  const inputBytes = buffer.length;

  if (inputBytes <= targetBytes) {
    return payload;
  }

  const contentBudget = targetBytes - MARKER_OVERHEAD;
  if (contentBudget <= 0) {
    return undefined;
  }

  const firstHalfBudget = Math.floor(contentBudget / 2);
  const lastHalfBudget = contentBudget - firstHalfBudget;

  const firstEnd = findSafeUtf8Boundary(buffer, firstHalfBudget);
  const lastStart = findSafeUtf8BoundaryAfter(buffer, inputBytes - lastHalfBudget);

  const firstPart = buffer.subarray(0, firstEnd).toString('utf8');
  const lastPart = buffer.subarray(lastStart).toString('utf8');

  const omittedBytes = lastStart - firstEnd;
  const result = firstPart + buildTruncationMarker(omittedBytes, 'bytes') + lastPart;

  if (Buffer.byteLength(result, 'utf8') > targetBytes) {
    return undefined;
  }
  return result;
}

/**
 * Cut a string to `targetBytes` from the front only, without a marker.
 * Used where the caller appends its own trailer.
 */
export function clipToBytes(payload: string, targetBytes: number): string {
  const buffer = Buffer.from(payload, 'utf8');
  if (buffer.length <= targetBytes) return payload;
  const end = findSafeUtf8Boundary(buffer, Math.max(0, targetBytes));
  return buffer.subarray(0, end).toString('utf8');
}
