import { promises as fs } from 'fs';
import { Readable } from 'stream';
import { ImageSource } from '../interfaces/captcha-client.interface';
import { ValidationException } from '../exceptions';
import { ImageFormat, sniffImageFormat } from './image-sniffer.util';

const BASE64_PREFIX = 'base64:';

const describeField = (field: string): string =>
  field === 'captcha' ? 'CAPTCHA' : field;

export interface LoadedImage {
  data: Buffer;
  format: Exclude<ImageFormat, 'unknown'>;
}

async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * Reads an image source into memory. Strings prefixed with `base64:` are
 * decoded; any other string is a file path.
 */
export async function readImageSource(
  source: ImageSource,
  field = 'captcha',
): Promise<Buffer> {
  if (Buffer.isBuffer(source)) {
    return source;
  }

  if (source instanceof Uint8Array) {
    return Buffer.from(source);
  }

  if (typeof source === 'string') {
    if (source.startsWith(BASE64_PREFIX)) {
      return Buffer.from(source.slice(BASE64_PREFIX.length), 'base64');
    }

    try {
      return await fs.readFile(source);
    } catch (error: unknown) {
      throw ValidationException.fromSingleError(
        `Cannot read ${field} file ${source}`,
        field,
        'IMAGE_UNREADABLE',
        { cause: error instanceof Error ? error.message : String(error) },
      );
    }
  }

  return readStream(source);
}

/**
 * Reads and sniffs an image, rejecting empty input and unrecognised formats
 * before anything is sent to the service.
 */
export async function loadImage(
  source: ImageSource,
  field = 'captcha',
): Promise<LoadedImage> {
  const data = await readImageSource(source, field);

  if (data.length === 0) {
    throw ValidationException.fromSingleError(
      `${describeField(field)} image is empty`,
      field,
      'IMAGE_EMPTY',
    );
  }

  const format = sniffImageFormat(data);
  if (format === 'unknown') {
    throw ValidationException.fromSingleError(
      `Unknown ${describeField(field)} image type`,
      field,
      'UNKNOWN_IMAGE_TYPE',
      { size: data.length },
    );
  }

  return { data, format };
}
