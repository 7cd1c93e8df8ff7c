import { z } from 'zod';
import { HttpError } from './httpErrors';

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export const ALLOWED_IMAGE_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'image/gif'] as const;

export const imageUploadSchema = z.object({
  fileName: z.string().trim().min(1, 'fileName is required').max(200),
  contentType: z.enum(ALLOWED_IMAGE_TYPES, { message: 'Invalid content type for image upload' }),
  // Plain base64 or a data: URL
  data: z.string().min(1, 'File data is required'),
});

export type ImageUploadPayload = z.infer<typeof imageUploadSchema>;

export interface DecodedUpload {
  fileName: string;
  contentType: string;
  body: Buffer;
}

export const decodeImageUpload = (payload: ImageUploadPayload): DecodedUpload => {
  const base64 = payload.data.replace(/^data:[^;,]+;base64,/, '');
  if (!/^[A-Za-z0-9+/\s]*={0,2}\s*$/.test(base64)) {
    throw new HttpError(400, 'File data must be base64 encoded');
  }

  const body = Buffer.from(base64, 'base64');
  if (body.length === 0) {
    throw new HttpError(400, 'Uploaded file is empty');
  }
  if (body.length > MAX_UPLOAD_BYTES) {
    throw new HttpError(400, `File too large. Maximum size is ${MAX_UPLOAD_BYTES / (1024 * 1024)}MB`);
  }

  return { fileName: payload.fileName, contentType: payload.contentType, body };
};
