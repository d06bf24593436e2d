import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';

import { createApp } from '../app';
import { FIXED_NOW, createHarness, imageUrl } from './fakes';

type Harness = ReturnType<typeof createHarness>;

const createBody = {
  name: 'Haircut',
  description: 'Wash and cut',
  duration: 45,
  price: 30,
  salon_id: 1,
};

describe('services routes', () => {
  let h: Harness;
  let app: Express;

  beforeEach(() => {
    h = createHarness();
    app = createApp({ manager: h.manager, observability: h.observability, logger: h.logger });
  });

  it('creates a service and answers in snake_case', async () => {
    const response = await request(app).post('/services').send({ ...createBody, image_base64: 'QUJD' });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({
      service_id: 1,
      name: 'Haircut',
      description: 'Wash and cut',
      duration: 45,
      price: 30,
      image_url: imageUrl('services/images/img1'),
      salon_id: 1,
      created_at: FIXED_NOW,
      updated_at: FIXED_NOW,
    });
  });

  it('rejects an invalid body with field details', async () => {
    const response = await request(app).post('/services').send({ ...createBody, name: '' });

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
    expect(response.body.error.details[0].path).toEqual(['name']);
  });

  it('maps a failed upload to 400 with the cause', async () => {
    h.host.uploadError = new Error('quota exceeded');

    const response = await request(app).post('/services').send({ ...createBody, image_base64: 'QUJD' });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: { code: 'UPLOAD_FAILED', message: 'Image upload failed: quota exceeded' },
    });
  });

  it('answers 404 for an empty listing', async () => {
    const response = await request(app).get('/services');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: { code: 'NOT_FOUND', message: 'No Services Found' } });
  });

  it('pages the listing with skip and limit', async () => {
    await request(app).post('/services').send({ ...createBody, name: 'A' });
    await request(app).post('/services').send({ ...createBody, name: 'B' });
    await request(app).post('/services').send({ ...createBody, name: 'C' });

    const response = await request(app).get('/services?skip=1&limit=1');

    expect(response.status).toBe(200);
    expect(response.body.map((service: { name: string }) => service.name)).toEqual(['B']);
  });

  it('reads one service and rejects unknown or malformed ids', async () => {
    await request(app).post('/services').send(createBody);

    const found = await request(app).get('/services/1');
    expect(found.status).toBe(200);
    expect(found.body.name).toBe('Haircut');

    const missing = await request(app).get('/services/99');
    expect(missing.status).toBe(404);
    expect(missing.body.error.message).toBe('Service not found');

    const malformed = await request(app).get('/services/abc');
    expect(malformed.status).toBe(400);
  });

  it('updates fields and removes the image', async () => {
    await request(app).post('/services').send({ ...createBody, image_base64: 'QUJD' });

    const response = await request(app).put('/services/1').send({ price: 35, remove_image: true });

    expect(response.status).toBe(200);
    expect(response.body.price).toBe(35);
    expect(response.body.image_url).toBeNull();
  });

  it('deletes a service with its image', async () => {
    await request(app).post('/services').send({ ...createBody, image_base64: 'QUJD' });

    const response = await request(app).delete('/services/1');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      message: 'Service deleted successfully. Deleted 1 associated assets: image',
      public_id: 'services/images/img1',
    });
  });

  it('uploads a standalone icon', async () => {
    const response = await request(app).post('/services/upload-image').send({ image_base64: 'QUJD', is_icon: true });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      url: imageUrl('services/icons/img1'),
      public_id: 'services/icons/img1',
    });
  });

  it('requires a payload for standalone uploads', async () => {
    const response = await request(app).post('/services/upload-image').send({});

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe('image_base64 is required');
  });

  it('deletes an image by a public id containing slashes', async () => {
    const response = await request(app).delete('/services/images/services/images/img7');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      message: 'Image services/images/img7 deleted successfully',
      public_id: 'services/images/img7',
    });
    expect(h.host.destroyed).toEqual(['services/images/img7']);
  });

  it('answers 404 when the host does not confirm an image deletion', async () => {
    h.host.destroyResult = 'not found';

    const response = await request(app).delete('/services/images/ghost');

    expect(response.status).toBe(404);
    expect(response.body.error.message).toBe('Image ghost not found or already deleted');
  });

  it('reports unexpected failures as 500 with the cause', async () => {
    vi.spyOn(h.repository, 'get').mockRejectedValueOnce(new Error('db down'));

    const response = await request(app).get('/services/1');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: { code: 'INTERNAL', message: 'Internal server error: db down' } });
  });

  it('rejects malformed JSON', async () => {
    const response = await request(app)
      .post('/services')
      .set('content-type', 'application/json')
      .send('{"name":');

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe('Malformed JSON body');
  });

  it('exposes cache counters on /metrics', async () => {
    await request(app).post('/services').send(createBody);
    await request(app).get('/services');
    await request(app).get('/services');

    const response = await request(app).get('/metrics');

    expect(response.status).toBe(200);
    expect(response.text).toContain('salonsvc_list_cache_hits_total 1\n');
    expect(response.text).toContain('salonsvc_list_cache_misses_total 1\n');
  });

  it('answers health checks', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.ok).toBe(true);
    expect(response.body.service).toBe('services-api');
  });
});
