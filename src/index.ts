import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { SqliteIdempotencyStore, SqliteSchedulingStore, openDatabase } from './db/sqlite.js';
import { ConsoleEventSink } from './scheduling/events.js';
import { BookingCoordinator } from './services/booking.service.js';
import { IdempotencyService } from './services/idempotency.service.js';
import { SchedulingService } from './services/scheduling.service.js';

// Load environment variables
dotenv.config();

const config = loadConfig();

const db = openDatabase(config.databasePath, { busyTimeoutMs: config.commitTimeoutMs });
console.log(`Database initialized: ${config.databasePath}`);

const store = new SqliteSchedulingStore(db);
const scheduling = new SchedulingService({
  store,
  coordinator: new BookingCoordinator(store, config.booking),
  events: new ConsoleEventSink(),
  granularityMinutes: config.booking.granularityMinutes,
  maxSlotRangeDays: config.maxSlotRangeDays,
});
const idempotency = new IdempotencyService(new SqliteIdempotencyStore(db));

const app = createApp({ scheduling, idempotency });

const server = app.listen(config.port, () => {
  console.log(`
Veterinary Appointment Scheduler
Server running on http://localhost:${config.port}

Endpoints:
  POST /api/veterinarians/:vetId/appointments        - Book an appointment
  GET  /api/veterinarians/:vetId/slots?from=&to=     - List free windows
  POST /api/veterinarians/:vetId/availability/rules  - Add a weekly availability rule
  POST /api/appointments/:id/reschedule|cancel|complete|no-show
  GET  /health                                       - Health check

Required Headers:
  Idempotency-Key: <uuid>     - For booking requests
  Content-Type: application/json
  `);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, closing server`);
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
