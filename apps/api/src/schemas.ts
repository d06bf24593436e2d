import { z } from 'zod';

import type { CreateServiceInput, ServiceRecord, ServiceResponse, UpdateServiceInput } from '@salonsvc/contracts';

export const serviceCreateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().nullish(),
  duration: z.number().int().positive(),
  price: z.number().nonnegative(),
  salon_id: z.number().int().positive(),
  image_base64: z.string().nullish(),
});

// Updates are field-level: null or absent means "leave unchanged".
export const serviceUpdateSchema = z.object({
  name: z.string().trim().min(1).max(200).nullish(),
  description: z.string().nullish(),
  duration: z.number().int().positive().nullish(),
  price: z.number().nonnegative().nullish(),
  salon_id: z.number().int().positive().nullish(),
  image_base64: z.string().nullish(),
  remove_image: z.boolean().nullish(),
});

export const imageUploadSchema = z.object({
  image_base64: z.string().default(''),
  is_icon: z.boolean().default(false),
});

export const serviceIdSchema = z.coerce.number().int().positive();

export const listQuerySchema = z.object({
  skip: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().optional(),
  limit: z.coerce.number().int().optional(),
});

export function toCreateInput(body: z.infer<typeof serviceCreateSchema>): CreateServiceInput {
  return {
    name: body.name,
    description: body.description ?? null,
    duration: body.duration,
    price: body.price,
    salonId: body.salon_id,
    imageBase64: body.image_base64,
  };
}

export function toUpdateInput(body: z.infer<typeof serviceUpdateSchema>): UpdateServiceInput {
  return {
    name: body.name,
    description: body.description,
    duration: body.duration,
    price: body.price,
    salonId: body.salon_id,
    imageBase64: body.image_base64,
    removeImage: body.remove_image,
  };
}

export function toServiceResponse(record: ServiceRecord): ServiceResponse {
  return {
    service_id: record.serviceId,
    name: record.name,
    description: record.description,
    duration: record.duration,
    price: record.price,
    image_url: record.imageUrl,
    salon_id: record.salonId,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}
