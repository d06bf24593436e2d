import { v2 as cloudinary } from 'cloudinary';
import { z } from 'zod';

import type { DeletionOutcome, UploadedImage } from '@salonsvc/contracts';
import { serializeError, type Logger } from '@salonsvc/shared';

import { readMediaHostConfig, type MediaHostConfig } from './config';
import { UploadError } from './errors';

export const SERVICE_IMAGE_FOLDER = 'services/images';
export const SERVICE_ICON_FOLDER = 'services/icons';

export type HostUploadOptions = {
  folder: string;
  publicId?: string;
};

export type HostUploadResult = {
  publicId: string;
  secureUrl: string;
  format: string;
};

/** The two calls the API makes against the remote media host. */
export interface MediaHostClient {
  upload(file: string, options: HostUploadOptions): Promise<HostUploadResult>;
  destroy(publicId: string): Promise<{ result: string }>;
}

const destroyResponseSchema = z.object({ result: z.string() });

export function createCloudinaryClient(
  readConfig: () => MediaHostConfig = () => readMediaHostConfig(),
): MediaHostClient {
  const configure = (): void => {
    const config = readConfig();
    cloudinary.config({
      cloud_name: config.cloudName,
      api_key: config.apiKey,
      api_secret: config.apiSecret,
      secure: true,
    });
  };

  return {
    async upload(file, options) {
      configure();
      const response = await cloudinary.uploader.upload(file, {
        folder: options.folder,
        public_id: options.publicId,
        overwrite: true,
        invalidate: true,
      });
      return {
        publicId: response.public_id,
        secureUrl: response.secure_url,
        format: response.format,
      };
    },
    async destroy(publicId) {
      configure();
      const response: unknown = await cloudinary.uploader.destroy(publicId);
      return destroyResponseSchema.parse(response);
    },
  };
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
// `<host>/.../upload/...` written without a scheme
const SCHEMELESS_DELIVERY_PATTERN = /^[\w-]+(\.[\w-]+)+\/(.+\/)?upload\//;
const VERSION_SEGMENT = /^v\d+$/;
const PUBLIC_ID_PATTERN = /^[\w-]+(\/[\w-]+)*$/;

function stripExtension(value: string): string {
  const slash = value.lastIndexOf('/');
  const dot = value.lastIndexOf('.');
  return dot > slash ? value.slice(0, dot) : value;
}

function toPublicId(candidate: string): string | null {
  const stripped = stripExtension(candidate);
  return PUBLIC_ID_PATTERN.test(stripped) ? stripped : null;
}

/**
 * Resolves a stored image reference to the media host's public id.
 *
 * Delivery URLs look like `https://<host>/<cloud>/image/upload/v<version>/<folder>/<id>.<ext>`;
 * the version segment and the scheme are optional. Anything else is taken as an
 * already-bare id and only loses its extension. Returns null when the reference
 * cannot name a blob.
 */
export function idFromReference(reference: string): string | null {
  const trimmed = reference.trim();
  if (!trimmed) return null;

  let url = trimmed;
  if (!SCHEME_PATTERN.test(trimmed)) {
    if (!SCHEMELESS_DELIVERY_PATTERN.test(trimmed)) return toPublicId(trimmed);
    url = `https://${trimmed}`;
  }

  let segments: string[];
  try {
    segments = new URL(url).pathname
      .split('/')
      .filter(Boolean)
      .map((segment) => decodeURIComponent(segment));
  } catch {
    return null;
  }

  const uploadIndex = segments.indexOf('upload');
  if (uploadIndex === -1) return null;

  let rest = segments.slice(uploadIndex + 1);
  if (rest.length > 0 && VERSION_SEGMENT.test(rest[0])) {
    rest = rest.slice(1);
  }
  if (rest.length === 0) return null;

  return toPublicId(rest.join('/'));
}

function normalizePayload(content: string | Buffer): string {
  if (typeof content !== 'string') {
    return content.toString('base64');
  }
  const trimmed = content.trim();
  if (trimmed.startsWith('data:')) {
    const comma = trimmed.indexOf(',');
    return comma === -1 ? '' : trimmed.slice(comma + 1);
  }
  return trimmed;
}

export class MediaStore {
  constructor(
    private readonly client: MediaHostClient,
    private readonly logger: Logger,
  ) {}

  async upload(content: string | Buffer, folder: string): Promise<UploadedImage> {
    const payload = normalizePayload(content);
    if (!payload) {
      this.logger.warn('media upload rejected', { folder, reason: 'empty payload' });
      throw new UploadError('empty image payload');
    }

    try {
      const result = await this.client.upload(`data:image/png;base64,${payload}`, { folder });
      this.logger.info('media uploaded', { folder, publicId: result.publicId });
      return {
        publicId: result.publicId,
        url: result.secureUrl,
        format: result.format,
      };
    } catch (error) {
      this.logger.error('media upload failed', { folder, ...serializeError(error) });
      throw new UploadError(error instanceof Error ? error.message : String(error));
    }
  }

  async deleteBlob(publicId: string): Promise<DeletionOutcome> {
    try {
      const response = await this.client.destroy(publicId);
      if (response.result === 'ok') {
        this.logger.info('media deleted', { publicId });
        return { status: 'deleted' };
      }
      this.logger.warn('media delete not confirmed', { publicId, result: response.result });
      return { status: 'not_deleted', detail: response.result };
    } catch (error) {
      this.logger.error('media delete failed', { publicId, ...serializeError(error) });
      return { status: 'unreachable', error: error instanceof Error ? error.message : String(error) };
    }
  }

  async delete(publicId: string): Promise<boolean> {
    const outcome = await this.deleteBlob(publicId);
    return outcome.status === 'deleted';
  }

  idFromReference(reference: string): string | null {
    const publicId = idFromReference(reference);
    if (publicId === null) {
      this.logger.warn('could not resolve media reference', { reference });
    }
    return publicId;
  }
}
