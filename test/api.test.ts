import request from 'supertest';
import { v4 as uuidv4 } from 'uuid';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../src/app.js';
import { SqliteIdempotencyStore } from '../src/db/sqlite.js';
import { IdempotencyService } from '../src/services/idempotency.service.js';
import { MONDAY, createHarness } from './helpers.js';

type App = ReturnType<typeof createApp>;

const booking = {
  pet_id: 'pet-1',
  start: '2026-11-02T10:00:00.000Z',
  end: '2026-11-02T10:30:00.000Z',
};

describe('HTTP API', () => {
  let harness: ReturnType<typeof createHarness>;
  let app: App;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    harness = createHarness();
    app = createApp({
      scheduling: harness.scheduling,
      idempotency: new IdempotencyService(new SqliteIdempotencyStore(harness.db)),
      requestLogging: false,
    });

    await request(app)
      .post('/api/veterinarians/vet-1/availability/rules')
      .send({ day_of_week: 1, start_time: '09:00', end_time: '17:00', effective_from: '2026-01-01' })
      .expect(201);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    harness.db.close();
  });

  function book(body: object, key: string = uuidv4()) {
    return request(app).post('/api/veterinarians/vet-1/appointments').set('Idempotency-Key', key).send(body);
  }

  it('reports health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
  });

  describe('POST /api/veterinarians/:vetId/appointments', () => {
    it('books an appointment', async () => {
      const res = await book(booking);

      expect(res.status).toBe(201);
      expect(res.body.success).toBe(true);
      expect(res.body.data).toMatchObject({
        veterinarian_id: 'vet-1',
        pet_id: 'pet-1',
        start: '2026-11-02T10:00:00.000Z',
        end: '2026-11-02T10:30:00.000Z',
        status: 'scheduled',
        version: 1,
      });
    });

    it('requires a UUID Idempotency-Key', async () => {
      const missing = await request(app).post('/api/veterinarians/vet-1/appointments').send(booking);
      const malformed = await book(booking, 'not-a-uuid');

      expect(missing.status).toBe(400);
      expect(missing.body.error.code).toBe('MISSING_IDEMPOTENCY_KEY');
      expect(missing.body.error.message).toBe('Creating an appointment requires an Idempotency-Key header');
      expect(malformed.status).toBe(400);
      expect(malformed.body.error).toEqual({
        code: 'MISSING_IDEMPOTENCY_KEY',
        message: 'Idempotency-Key is not a UUID',
        details: { received: 'not-a-uuid' },
      });
    });

    it('replays the stored response for a repeated key', async () => {
      const key = uuidv4();

      const first = await book(booking, key);
      const second = await book(booking, key);

      expect(second.status).toBe(201);
      expect(second.body).toEqual(first.body);

      const slots = await request(app)
        .get('/api/veterinarians/vet-1/slots')
        .query({ from: MONDAY, to: MONDAY });
      expect(slots.body.data).toHaveLength(2);
    });

    it('rejects a repeated key with a different body', async () => {
      const key = uuidv4();
      await book(booking, key);

      const res = await book({ ...booking, pet_id: 'pet-2' }, key);

      expect(res.status).toBe(422);
      expect(res.body.error.code).toBe('IDEMPOTENCY_KEY_MISMATCH');
    });

    it('answers 409 for an overlapping booking', async () => {
      await book(booking);

      const res = await book({
        pet_id: 'pet-2',
        start: '2026-11-02T10:15:00.000Z',
        end: '2026-11-02T10:45:00.000Z',
      });

      expect(res.status).toBe(409);
      expect(res.body.error).toEqual({
        code: 'SLOT_UNAVAILABLE',
        message: 'This time slot is already booked',
        details: { start: '2026-11-02T10:15:00.000Z', end: '2026-11-02T10:45:00.000Z' },
      });
    });

    it('answers 422 outside availability and 400 for a bad duration', async () => {
      const outside = await book({ ...booking, start: '2026-11-02T16:45:00.000Z', end: '2026-11-02T17:15:00.000Z' });
      const short = await book({ ...booking, end: '2026-11-02T10:10:00.000Z' });

      expect(outside.status).toBe(422);
      expect(outside.body.error.code).toBe('OUTSIDE_AVAILABILITY');
      expect(short.status).toBe(400);
      expect(short.body.error.code).toBe('INVALID_DURATION');
    });

    it('answers 400 for an appointment longer than the maximum', async () => {
      const res = await book({ ...booking, end: '9999-11-02T10:00:00.000Z' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_DURATION');
      expect(res.body.error.message).toBe('duration must be at most 480 minutes');
    });

    it('validates the body and remembers the rejection', async () => {
      const key = uuidv4();

      const first = await book({ start: booking.start, end: booking.end }, key);
      const replay = await book({ start: booking.start, end: booking.end }, key);

      expect(first.status).toBe(400);
      expect(first.body.error.code).toBe('VALIDATION_ERROR');
      expect(first.body.error.details.issues[0].path).toBe('pet_id');
      expect(replay.status).toBe(400);
      expect(replay.body).toEqual(first.body);
    });

    it('rejects datetimes without an offset', async () => {
      const res = await book({ ...booking, start: '2026-11-02 10:00' });

      expect(res.status).toBe(400);
      expect(res.body.error.details.issues[0].path).toBe('start');
    });
  });

  describe('GET /api/veterinarians/:vetId/slots', () => {
    it('lists free windows around a booking', async () => {
      await book(booking);

      const res = await request(app).get('/api/veterinarians/vet-1/slots').query({ from: MONDAY, to: MONDAY });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([
        { start: '2026-11-02T09:00:00.000Z', end: '2026-11-02T10:00:00.000Z' },
        { start: '2026-11-02T10:30:00.000Z', end: '2026-11-02T17:00:00.000Z' },
      ]);
    });

    it('requires a date range', async () => {
      const res = await request(app).get('/api/veterinarians/vet-1/slots');

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects an inverted range', async () => {
      const res = await request(app)
        .get('/api/veterinarians/vet-1/slots')
        .query({ from: '2026-11-09', to: MONDAY });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_WINDOW');
    });
  });

  describe('availability management', () => {
    it('adds and removes an exception', async () => {
      const created = await request(app)
        .post('/api/veterinarians/vet-1/availability/exceptions')
        .send({ date: MONDAY, kind: 'removed', start_time: '12:00', end_time: '13:00', reason: 'Training' });

      expect(created.status).toBe(201);
      expect(created.body.data).toMatchObject({ date: MONDAY, kind: 'removed', reason: 'Training' });

      const listed = await request(app)
        .get('/api/veterinarians/vet-1/availability')
        .query({ from: MONDAY, to: MONDAY });
      expect(listed.body.data.exceptions).toHaveLength(1);
      expect(listed.body.data.rules[0]).toMatchObject({ day_of_week: 1, start_time: '09:00', end_time: '17:00' });

      const id: string = created.body.data.exception_id;
      const removed = await request(app).delete(`/api/veterinarians/vet-1/availability/exceptions/${id}`);
      const again = await request(app).delete(`/api/veterinarians/vet-1/availability/exceptions/${id}`);

      expect(removed.status).toBe(200);
      expect(removed.body.data).toEqual({ id, removed: true });
      expect(again.status).toBe(404);
    });

    it('rejects an unknown exception kind', async () => {
      const res = await request(app)
        .post('/api/veterinarians/vet-1/availability/exceptions')
        .send({ date: MONDAY, kind: 'holiday', start_time: '12:00', end_time: '13:00' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects a rule whose window is inverted', async () => {
      const res = await request(app)
        .post('/api/veterinarians/vet-1/availability/rules')
        .send({ day_of_week: 2, start_time: '17:00', end_time: '09:00', effective_from: '2026-01-01' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_WINDOW');
    });
  });

  describe('appointment routes', () => {
    async function bookedId(): Promise<string> {
      const res = await book(booking);
      return res.body.data.appointment_id;
    }

    it('fetches an appointment and 404s on an unknown id', async () => {
      const id = await bookedId();

      const found = await request(app).get(`/api/appointments/${id}`);
      const missing = await request(app).get('/api/appointments/missing');

      expect(found.body.data.appointment_id).toBe(id);
      expect(missing.status).toBe(404);
      expect(missing.body.error.code).toBe('NOT_FOUND');
    });

    it('reschedules with optimistic versioning', async () => {
      const id = await bookedId();
      const move = { start: '2026-11-02T11:00:00.000Z', end: '2026-11-02T11:30:00.000Z' };

      const moved = await request(app)
        .post(`/api/appointments/${id}/reschedule`)
        .send({ ...move, expected_version: 1 });
      const stale = await request(app)
        .post(`/api/appointments/${id}/reschedule`)
        .send({ ...move, expected_version: 1 });

      expect(moved.status).toBe(200);
      expect(moved.body.data).toMatchObject({ start: move.start, version: 2 });
      expect(stale.status).toBe(409);
      expect(stale.body.error.code).toBe('CONCURRENT_MODIFICATION');
    });

    it('cancels idempotently', async () => {
      const id = await bookedId();

      const first = await request(app).post(`/api/appointments/${id}/cancel`);
      const second = await request(app).post(`/api/appointments/${id}/cancel`).send({ expected_version: 1 });

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      expect(second.body.data).toEqual(first.body.data);
      expect(second.body.data).toMatchObject({ status: 'cancelled', version: 2 });
    });

    it('refuses to complete a visit that has not started', async () => {
      const id = await bookedId();

      const res = await request(app).post(`/api/appointments/${id}/complete`).send({});

      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('INVALID_TRANSITION');
    });

    it('validates the expected version', async () => {
      const id = await bookedId();

      const res = await request(app).post(`/api/appointments/${id}/no-show`).send({ expected_version: 'one' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  it('answers malformed JSON with a validation error', async () => {
    const res = await request(app)
      .post('/api/appointments/some-id/cancel')
      .set('Content-Type', 'application/json')
      .send('{"expected_version":');

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' });
  });

  it('answers unknown endpoints with 404', async () => {
    const res = await request(app).get('/api/unknown');

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('NOT_FOUND');
  });
});
