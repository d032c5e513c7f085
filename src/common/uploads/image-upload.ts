/**
 * Dental Clinic API - Image Upload Validation
 *
 * Treatment images arrive either as a multipart file or as a base64 data URI
 * inside a JSON body. Both end up as an `ImagePayload` checked against the
 * same size and type limits.
 */

import { ApiValidationException } from '../http/api-validation.exception';

export const MAX_IMAGE_BYTES = 5 * 1024 * 1024;

export const ALLOWED_IMAGE_TYPES: readonly string[] = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'];

// Values some clients send for an unselected file input
const EMPTY_PLACEHOLDERS: readonly string[] = ['', 'null', 'None', '[]', '{}'];

const DATA_URI = /^data:([a-zA-Z0-9.+/-]+);base64,([A-Za-z0-9+/=\s]*)$/;

export interface ImagePayload {
  buffer: Buffer;
  mimeType: string;
}

export interface UploadedImageFile {
  buffer: Buffer;
  mimetype: string;
  size: number;
}

export function isEmptyImagePlaceholder(value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === 'string') {
    return EMPTY_PLACEHOLDERS.includes(value.trim());
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (typeof value === 'object') {
    return Object.keys(value).length === 0;
  }
  return false;
}

export function assertValidImage(payload: ImagePayload, field = 'uploadImage'): ImagePayload {
  if (payload.buffer.length > MAX_IMAGE_BYTES) {
    throw new ApiValidationException({ [field]: ['Image file size cannot exceed 5MB.'] });
  }
  if (!ALLOWED_IMAGE_TYPES.includes(payload.mimeType)) {
    throw new ApiValidationException({ [field]: ['Invalid image format. Allowed: JPEG, PNG, GIF, WebP'] });
  }
  return payload;
}

export function decodeDataUri(value: string, field = 'uploadImage'): ImagePayload {
  const match = DATA_URI.exec(value.trim());
  if (!match) {
    throw new ApiValidationException({ [field]: ['Image must be a base64 data URI.'] });
  }
  const [, mimeType, data] = match;
  return assertValidImage({ mimeType, buffer: Buffer.from(data, 'base64') }, field);
}

/**
 * Normalizes the JSON `uploadImage` value: placeholders mean no image, any
 * other string must be a valid data URI.
 */
export function imageFromBody(value: unknown, field = 'uploadImage'): ImagePayload | null {
  if (isEmptyImagePlaceholder(value)) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ApiValidationException({ [field]: ['Image must be a base64 data URI.'] });
  }
  return decodeDataUri(value, field);
}

export function imageFromFile(file: UploadedImageFile, field = 'image'): ImagePayload {
  if (file.size > MAX_IMAGE_BYTES) {
    throw new ApiValidationException({ [field]: ['Image file size cannot exceed 5MB.'] });
  }
  return assertValidImage({ buffer: file.buffer, mimeType: file.mimetype }, field);
}
