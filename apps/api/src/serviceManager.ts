import type {
  CreateServiceInput,
  DeleteSummary,
  ImageUploadSummary,
  PageRequest,
  ServiceChanges,
  ServiceRecord,
  UpdateServiceInput,
  UploadedImage,
} from '@salonsvc/contracts';
import { serializeError, type Logger } from '@salonsvc/shared';

import { NotFoundError, UploadError, ValidationError } from './errors';
import type { ListCache } from './listCache';
import { SERVICE_ICON_FOLDER, SERVICE_IMAGE_FOLDER, type MediaStore } from './media';
import type { ServiceObservability } from './observability';
import type { ServiceRepository } from './persistence';

export const MAX_PAGE_SIZE = 100;

export function clampPage(offset: number, limit: number): PageRequest {
  return {
    offset: Math.max(offset, 0),
    limit: Math.max(Math.min(limit, MAX_PAGE_SIZE), 0),
  };
}

export type ServiceManagerDeps = {
  repository: ServiceRepository;
  cache: ListCache;
  media: MediaStore;
  observability: ServiceObservability;
  logger: Logger;
};

/**
 * Owns the service record lifecycle: every mutation keeps the record store,
 * the media host and the listing cache consistent with one another.
 *
 * Ordering rules:
 * - uploads happen before any record write, so a rejected upload leaves no record;
 * - the listing cache is invalidated before a mutation returns;
 * - blob deletions are best-effort and never fail the request.
 */
export class ServiceManager {
  private readonly repository: ServiceRepository;

  private readonly cache: ListCache;

  private readonly media: MediaStore;

  private readonly observability: ServiceObservability;

  private readonly logger: Logger;

  constructor(deps: ServiceManagerDeps) {
    this.repository = deps.repository;
    this.cache = deps.cache;
    this.media = deps.media;
    this.observability = deps.observability;
    this.logger = deps.logger;
  }

  async create(input: CreateServiceInput): Promise<ServiceRecord> {
    const uploaded = input.imageBase64
      ? await this.upload(input.imageBase64, SERVICE_IMAGE_FOLDER)
      : null;

    let created: ServiceRecord;
    try {
      created = await this.repository.create({
        name: input.name,
        description: input.description,
        duration: input.duration,
        price: input.price,
        imageUrl: uploaded ? uploaded.url : null,
        salonId: input.salonId,
      });
    } catch (error) {
      if (uploaded) {
        await this.discardBlob(uploaded.publicId, 'record insert failed');
      }
      throw error;
    }

    await this.cache.invalidate();
    this.logger.info('service created', { serviceId: created.serviceId, withImage: Boolean(uploaded) });
    return created;
  }

  async list(offset = 0, limit = MAX_PAGE_SIZE): Promise<ServiceRecord[]> {
    const page = clampPage(offset, limit);

    const lookup = await this.cache.get();
    this.observability.observeCacheLookup(lookup.hit);

    let listing: ServiceRecord[];
    if (lookup.hit) {
      this.logger.debug('returning cached services', { offset: page.offset, limit: page.limit });
      listing = lookup.records;
    } else {
      // Only the full listing is ever cached; a page would be read back as if it were everything.
      listing = await this.repository.list();
      if (listing.length > 0) {
        await this.cache.populate(listing, lookup.generation);
      }
    }

    const window = listing.slice(page.offset, page.offset + page.limit);
    if (window.length === 0) {
      this.logger.warn('no services found', { offset: page.offset, limit: page.limit });
      throw new NotFoundError('No Services Found');
    }
    return window;
  }

  async get(serviceId: number): Promise<ServiceRecord> {
    const record = await this.repository.get(serviceId);
    if (!record) {
      throw new NotFoundError('Service not found');
    }
    return record;
  }

  async update(serviceId: number, input: UpdateServiceInput): Promise<ServiceRecord> {
    const current = await this.repository.get(serviceId);
    if (!current) {
      throw new NotFoundError('Service was not found');
    }

    const changes: ServiceChanges = {};
    if (input.name != null) changes.name = input.name;
    if (input.description != null) changes.description = input.description;
    if (input.duration != null) changes.duration = input.duration;
    if (input.price != null) changes.price = input.price;
    if (input.salonId != null) changes.salonId = input.salonId;

    let uploaded: UploadedImage | null = null;
    let replacedBlobId: string | null = null;

    if (input.removeImage && current.imageUrl) {
      const blobId = this.media.idFromReference(current.imageUrl);
      if (blobId && await this.deleteBlob(blobId)) {
        changes.imageUrl = null;
        this.logger.info('service image removed', { serviceId, publicId: blobId });
      }
    } else if (input.imageBase64) {
      uploaded = await this.upload(input.imageBase64, SERVICE_IMAGE_FOLDER);
      changes.imageUrl = uploaded.url;
      replacedBlobId = current.imageUrl ? this.media.idFromReference(current.imageUrl) : null;
      this.logger.info('service image uploaded', { serviceId, publicId: uploaded.publicId });
    }

    let updated: ServiceRecord | null;
    try {
      updated = await this.repository.update(serviceId, changes);
    } catch (error) {
      if (uploaded) {
        await this.discardBlob(uploaded.publicId, 'record update failed');
      }
      throw error;
    }
    if (!updated) {
      if (uploaded) {
        await this.discardBlob(uploaded.publicId, 'record vanished before update');
      }
      throw new NotFoundError('Service was not found');
    }

    await this.cache.invalidate();

    // The old image goes only once the new reference is committed.
    if (replacedBlobId && uploaded && replacedBlobId !== uploaded.publicId) {
      await this.discardBlob(replacedBlobId, 'image replaced');
    }

    return updated;
  }

  async delete(serviceId: number): Promise<DeleteSummary> {
    const current = await this.repository.get(serviceId);
    if (!current) {
      throw new NotFoundError('Service not found');
    }

    let deletedBlobId: string | null = null;
    if (current.imageUrl) {
      const blobId = this.media.idFromReference(current.imageUrl);
      if (blobId && await this.deleteBlob(blobId)) {
        deletedBlobId = blobId;
      }
    }

    await this.repository.delete(serviceId);
    await this.cache.invalidate();

    const deletedAssets = deletedBlobId ? ['image'] : [];
    this.logger.info('service deleted', { serviceId, deletedAssets: deletedAssets.length });

    return {
      success: true,
      message: `Service deleted successfully. Deleted ${deletedAssets.length} associated assets: ${deletedAssets.join(', ') || 'none'}`,
      publicId: deletedBlobId,
    };
  }

  async uploadImage(content: string, isIcon = false): Promise<ImageUploadSummary> {
    if (!content) {
      throw new ValidationError('image_base64 is required');
    }
    const uploaded = await this.upload(content, isIcon ? SERVICE_ICON_FOLDER : SERVICE_IMAGE_FOLDER);
    return {
      success: true,
      url: uploaded.url,
      publicId: uploaded.publicId,
    };
  }

  async deleteImage(reference: string): Promise<DeleteSummary> {
    const publicId = this.media.idFromReference(reference) ?? reference;
    if (publicId.includes('http')) {
      throw new ValidationError('Please provide only the public_id, not full URL');
    }

    if (!await this.deleteBlob(publicId)) {
      throw new NotFoundError(`Image ${publicId} not found or already deleted`);
    }

    return {
      success: true,
      message: `Image ${publicId} deleted successfully`,
      publicId,
    };
  }

  private async upload(content: string, folder: string): Promise<UploadedImage> {
    try {
      return await this.media.upload(content, folder);
    } catch (error) {
      if (error instanceof UploadError) {
        this.observability.observeUploadFailure();
      }
      throw error;
    }
  }

  private async deleteBlob(publicId: string): Promise<boolean> {
    const outcome = await this.media.deleteBlob(publicId);
    this.observability.observeDeletion(outcome);
    return outcome.status === 'deleted';
  }

  private async discardBlob(publicId: string, reason: string): Promise<void> {
    const deleted = await this.deleteBlob(publicId);
    if (!deleted) {
      this.logger.warn('orphaned media blob left behind', { publicId, reason });
    }
  }

  async init(): Promise<void> {
    await this.repository.init();
    await this.cache.init();
  }

  /** Closes the collaborators this manager was built with. */
  async close(): Promise<void> {
    const results = await Promise.allSettled([this.repository.close(), this.cache.close()]);
    results.forEach((result) => {
      if (result.status === 'rejected') {
        this.logger.error('shutdown step failed', serializeError(result.reason));
      }
    });
  }
}
