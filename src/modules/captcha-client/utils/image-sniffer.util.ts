export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'bmp' | 'webp' | 'unknown';

interface SignaturePart {
  offset: number;
  bytes: readonly number[];
}

interface ImageSignature {
  format: Exclude<ImageFormat, 'unknown'>;
  parts: readonly SignaturePart[];
}

const ascii = (text: string): number[] =>
  Array.from(text, (char) => char.charCodeAt(0));

/**
 * Number of leading bytes inspected. Every signature below fits inside it.
 */
export const SNIFF_LENGTH = 12;

/**
 * Ordered most specific first: a signature made of more matched bytes wins
 * over a shorter one that would also match.
 */
const SIGNATURES: readonly ImageSignature[] = [
  {
    format: 'webp',
    parts: [
      { offset: 0, bytes: ascii('RIFF') },
      { offset: 8, bytes: ascii('WEBP') },
    ],
  },
  {
    format: 'png',
    parts: [
      { offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
    ],
  },
  { format: 'gif', parts: [{ offset: 0, bytes: ascii('GIF87a') }] },
  { format: 'gif', parts: [{ offset: 0, bytes: ascii('GIF89a') }] },
  { format: 'jpeg', parts: [{ offset: 0, bytes: [0xff, 0xd8, 0xff] }] },
  { format: 'bmp', parts: [{ offset: 0, bytes: ascii('BM') }] },
];

function matches(head: Uint8Array, signature: ImageSignature): boolean {
  return signature.parts.every(({ offset, bytes }) =>
    bytes.every((byte, index) => head[offset + index] === byte),
  );
}

/**
 * Classifies image bytes by their magic number. Only the first
 * {@link SNIFF_LENGTH} bytes are read; the input is never modified.
 */
export function sniffImageFormat(data: Uint8Array): ImageFormat {
  const head = data.subarray(0, SNIFF_LENGTH);
  if (head.length === 0) {
    return 'unknown';
  }

  const signature = SIGNATURES.find((candidate) => matches(head, candidate));
  return signature ? signature.format : 'unknown';
}
