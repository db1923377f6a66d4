import { sniffImageFormat } from './image-sniffer.util';

const bytes = (...values: number[]): Buffer => Buffer.from(values);

describe('sniffImageFormat', () => {
  it('should detect PNG', () => {
    const png = Buffer.concat([
      bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a),
      Buffer.alloc(8),
    ]);

    expect(sniffImageFormat(png)).toBe('png');
  });

  it('should detect JPEG with JFIF and Exif markers', () => {
    expect(sniffImageFormat(bytes(0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10))).toBe(
      'jpeg',
    );
    expect(sniffImageFormat(bytes(0xff, 0xd8, 0xff, 0xe1, 0x00, 0x10))).toBe(
      'jpeg',
    );
  });

  it('should detect both GIF versions', () => {
    expect(sniffImageFormat(Buffer.from('GIF87a\x01\x00'))).toBe('gif');
    expect(sniffImageFormat(Buffer.from('GIF89a\x01\x00'))).toBe('gif');
  });

  it('should not accept other GIF-like headers', () => {
    expect(sniffImageFormat(Buffer.from('GIF88a\x01\x00'))).toBe('unknown');
  });

  it('should detect BMP', () => {
    expect(sniffImageFormat(Buffer.from('BM\x36\x00\x00\x00'))).toBe('bmp');
  });

  it('should detect WebP only inside a RIFF container', () => {
    expect(sniffImageFormat(Buffer.from('RIFF\x24\x00\x00\x00WEBPVP8 '))).toBe(
      'webp',
    );
    expect(sniffImageFormat(Buffer.from('RIFF\x24\x00\x00\x00WAVEfmt '))).toBe(
      'unknown',
    );
  });

  it('should return unknown for unrecognised or empty input', () => {
    expect(sniffImageFormat(Buffer.from('UNKNOWN_FORMAT'))).toBe('unknown');
    expect(sniffImageFormat(Buffer.alloc(0))).toBe('unknown');
  });

  it('should return unknown for a truncated signature', () => {
    expect(sniffImageFormat(bytes(0x89, 0x50, 0x4e))).toBe('unknown');
  });

  it('should accept a plain Uint8Array and leave it untouched', () => {
    const data = new Uint8Array([0xff, 0xd8, 0xff, 0xdb, 1, 2, 3]);
    const copy = Uint8Array.from(data);

    expect(sniffImageFormat(data)).toBe('jpeg');
    expect(data).toEqual(copy);
  });
});
