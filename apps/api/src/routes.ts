import type { Request, Response } from 'express';
import { Router } from 'express';

import type { DeleteSummary, ImageDeleteResponse, ImageUploadResponse } from '@salonsvc/contracts';

import { asyncHandler } from './http';
import {
  imageUploadSchema,
  listQuerySchema,
  serviceCreateSchema,
  serviceIdSchema,
  serviceUpdateSchema,
  toCreateInput,
  toServiceResponse,
  toUpdateInput,
} from './schemas';
import { MAX_PAGE_SIZE, type ServiceManager } from './serviceManager';

function toDeleteResponse(summary: DeleteSummary): ImageDeleteResponse {
  return {
    success: summary.success,
    message: summary.message,
    public_id: summary.publicId,
  };
}

export class ServicesController {
  constructor(private readonly manager: ServiceManager) {}

  async create(req: Request, res: Response): Promise<void> {
    const body = serviceCreateSchema.parse(req.body);
    const created = await this.manager.create(toCreateInput(body));
    res.status(201).json(toServiceResponse(created));
  }

  async list(req: Request, res: Response): Promise<void> {
    const query = listQuerySchema.parse(req.query);
    const records = await this.manager.list(query.offset ?? query.skip ?? 0, query.limit ?? MAX_PAGE_SIZE);
    res.json(records.map(toServiceResponse));
  }

  async get(req: Request, res: Response): Promise<void> {
    const serviceId = serviceIdSchema.parse(req.params.serviceId);
    const record = await this.manager.get(serviceId);
    res.json(toServiceResponse(record));
  }

  async update(req: Request, res: Response): Promise<void> {
    const serviceId = serviceIdSchema.parse(req.params.serviceId);
    const body = serviceUpdateSchema.parse(req.body);
    const updated = await this.manager.update(serviceId, toUpdateInput(body));
    res.json(toServiceResponse(updated));
  }

  async delete(req: Request, res: Response): Promise<void> {
    const serviceId = serviceIdSchema.parse(req.params.serviceId);
    const summary = await this.manager.delete(serviceId);
    res.json(toDeleteResponse(summary));
  }

  async uploadImage(req: Request, res: Response): Promise<void> {
    const body = imageUploadSchema.parse(req.body);
    const summary = await this.manager.uploadImage(body.image_base64, body.is_icon);
    const response: ImageUploadResponse = {
      success: summary.success,
      url: summary.url,
      public_id: summary.publicId,
    };
    res.json(response);
  }

  async deleteImage(req: Request, res: Response): Promise<void> {
    // Public ids contain slashes, so the id is the regex capture rather than a named param.
    const summary = await this.manager.deleteImage(req.params[0]);
    res.json(toDeleteResponse(summary));
  }
}

export function createServicesRouter(controller: ServicesController): Router {
  const router = Router();

  router.post('/upload-image', asyncHandler((req, res) => controller.uploadImage(req, res)));
  router.delete(/^\/images\/(.+)$/, asyncHandler((req, res) => controller.deleteImage(req, res)));

  router.get('/', asyncHandler((req, res) => controller.list(req, res)));
  router.post('/', asyncHandler((req, res) => controller.create(req, res)));
  router.get('/:serviceId', asyncHandler((req, res) => controller.get(req, res)));
  router.put('/:serviceId', asyncHandler((req, res) => controller.update(req, res)));
  router.delete('/:serviceId', asyncHandler((req, res) => controller.delete(req, res)));

  return router;
}
