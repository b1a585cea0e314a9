import type { KernelEnvelope } from "./messages.js";

// Binary frames follow the Jupyter server layout: a big-endian u32 part
// count, one u32 offset per part, then the JSON message followed by each
// binary buffer.

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseJson = (text: string): Record<string, unknown> | null => {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

export const encodeFrame = (envelope: KernelEnvelope): string | Uint8Array => {
  const { buffers, ...message } = envelope;
  const json = JSON.stringify(message);
  if (buffers.length === 0) {
    return json;
  }
  return packBinary(encoder.encode(json), buffers);
};

const packBinary = (json: Uint8Array, buffers: Uint8Array[]): Uint8Array => {
  const parts = [json, ...buffers];
  const nbufs = parts.length;
  const headerSize = 4 * (nbufs + 1);
  const total = parts.reduce((sum, part) => sum + part.byteLength, headerSize);
  const out = new Uint8Array(total);
  const view = new DataView(out.buffer);
  view.setUint32(0, nbufs, false);
  let offset = headerSize;
  parts.forEach((part, i) => {
    view.setUint32(4 * (i + 1), offset, false);
    out.set(part, offset);
    offset += part.byteLength;
  });
  return out;
};

/**
 * Decodes a text or binary websocket frame into a raw message object, or
 * `null` if the frame is malformed. The result is not schema-checked.
 */
export const decodeFrame = (
  data: string | Uint8Array
): Record<string, unknown> | null => {
  if (typeof data === "string") {
    return parseJson(data);
  }
  return unpackBinary(data);
};

const unpackBinary = (bytes: Uint8Array): Record<string, unknown> | null => {
  if (bytes.byteLength < 4) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const nbufs = view.getUint32(0, false);
  if (nbufs < 1) return null;
  const headerSize = 4 * (nbufs + 1);
  if (bytes.byteLength < headerSize) return null;

  const offsets: number[] = [];
  for (let i = 0; i < nbufs; i++) {
    offsets.push(view.getUint32(4 * (i + 1), false));
  }
  offsets.push(bytes.byteLength);
  for (let i = 0; i < nbufs; i++) {
    const start = offsets[i] ?? 0;
    const end = offsets[i + 1] ?? 0;
    if (start < headerSize || end < start || end > bytes.byteLength) {
      return null;
    }
  }

  const parts = offsets
    .slice(0, nbufs)
    .map((start, i) => bytes.slice(start, offsets[i + 1]));
  const [json, ...buffers] = parts;
  if (!json) return null;
  const message = parseJson(decoder.decode(json));
  if (!message) return null;
  return { ...message, buffers };
};
