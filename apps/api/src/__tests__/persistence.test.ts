import { describe, it, expect, beforeEach } from 'vitest';

import { InMemoryServiceRepository, toServiceRecord } from '../persistence';
import { FIXED_NOW, haircut } from './fakes';

describe('InMemoryServiceRepository', () => {
  let repository: InMemoryServiceRepository;

  beforeEach(() => {
    repository = new InMemoryServiceRepository(() => new Date(FIXED_NOW));
  });

  it('assigns ids and timestamps on create', async () => {
    const created = await repository.create({ ...haircut, imageUrl: null });

    expect(created).toEqual({
      serviceId: 1,
      name: 'Haircut',
      description: 'Wash and cut',
      duration: 45,
      price: 30,
      imageUrl: null,
      salonId: 1,
      createdAt: FIXED_NOW,
      updatedAt: FIXED_NOW,
    });
    await expect(repository.get(1)).resolves.toEqual(created);
  });

  it('lists in id order, paged or whole', async () => {
    await repository.create({ ...haircut, name: 'A', imageUrl: null });
    await repository.create({ ...haircut, name: 'B', imageUrl: null });
    await repository.create({ ...haircut, name: 'C', imageUrl: null });

    const all = await repository.list();
    expect(all.map((record) => record.name)).toEqual(['A', 'B', 'C']);

    const page = await repository.list({ offset: 1, limit: 1 });
    expect(page.map((record) => record.name)).toEqual(['B']);
  });

  it('updates only the given fields and reports missing ids', async () => {
    await repository.create({ ...haircut, imageUrl: null });

    const updated = await repository.update(1, { price: 42 });
    expect(updated?.price).toBe(42);
    expect(updated?.name).toBe('Haircut');

    await expect(repository.update(9, { price: 1 })).resolves.toBeNull();
  });

  it('deletes records', async () => {
    await repository.create({ ...haircut, imageUrl: null });

    await expect(repository.delete(1)).resolves.toBe(true);
    await expect(repository.delete(1)).resolves.toBe(false);
    await expect(repository.get(1)).resolves.toBeNull();
  });
});

describe('toServiceRecord', () => {
  it('maps a postgres row onto the domain record', () => {
    const record = toServiceRecord({
      service_id: 3,
      name: 'Colour',
      description: null,
      duration: 90,
      price: '55.50',
      image_url: 'https://res.cloudinary.com/demo/image/upload/v1/services/images/c.png',
      salon_id: 2,
      created_at: new Date(FIXED_NOW),
      updated_at: new Date(FIXED_NOW),
    });

    expect(record).toEqual({
      serviceId: 3,
      name: 'Colour',
      description: null,
      duration: 90,
      price: 55.5,
      imageUrl: 'https://res.cloudinary.com/demo/image/upload/v1/services/images/c.png',
      salonId: 2,
      createdAt: FIXED_NOW,
      updatedAt: FIXED_NOW,
    });
  });
});
