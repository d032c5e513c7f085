import { ApiValidationException } from '../http/api-validation.exception';
import {
  decodeDataUri,
  imageFromBody,
  imageFromFile,
  isEmptyImagePlaceholder,
  MAX_IMAGE_BYTES,
} from './image-upload';

const PNG_DATA_URI = `data:image/png;base64,${Buffer.from('fake-png').toString('base64')}`;

describe('image upload', () => {
  describe('isEmptyImagePlaceholder()', () => {
    it.each([null, undefined, '', '  ', 'null', 'None', '[]', '{}', [], {}])(
      'should treat %p as no image',
      (value) => {
        expect(isEmptyImagePlaceholder(value)).toBe(true);
      },
    );

    it('should not treat a data URI as empty', () => {
      expect(isEmptyImagePlaceholder(PNG_DATA_URI)).toBe(false);
    });
  });

  describe('imageFromBody()', () => {
    it('should return null for a placeholder', () => {
      expect(imageFromBody('None')).toBeNull();
    });

    it('should decode a data URI', () => {
      const image = imageFromBody(PNG_DATA_URI);

      expect(image?.mimeType).toBe('image/png');
      expect(image?.buffer.toString()).toBe('fake-png');
    });

    it('should reject values that are not strings', () => {
      expect(() => imageFromBody(42)).toThrow(ApiValidationException);
    });
  });

  describe('decodeDataUri()', () => {
    it('should reject plain text', () => {
      expect(() => decodeDataUri('not-an-image')).toThrow('Validation failed.');
    });

    it('should reject an unsupported type under the given field', () => {
      try {
        decodeDataUri(`data:image/bmp;base64,${Buffer.from('x').toString('base64')}`, 'image');
        throw new Error('expected a validation error');
      } catch (error) {
        expect(error).toBeInstanceOf(ApiValidationException);
        expect((error as ApiValidationException).details).toEqual({
          image: ['Invalid image format. Allowed: JPEG, PNG, GIF, WebP'],
        });
      }
    });
  });

  describe('imageFromFile()', () => {
    it('should accept a small jpeg', () => {
      const file = { buffer: Buffer.from('jpeg'), mimetype: 'image/jpeg', size: 4 };

      expect(imageFromFile(file)).toEqual({ buffer: file.buffer, mimeType: 'image/jpeg' });
    });

    it('should reject files over 5MB', () => {
      const file = { buffer: Buffer.alloc(1), mimetype: 'image/jpeg', size: MAX_IMAGE_BYTES + 1 };

      expect(() => imageFromFile(file)).toThrow(ApiValidationException);
    });
  });
});
