import request from 'supertest';
import { createApp } from './app';
import { MemoryDatabase } from './test-utils/memoryStore';
import { createTestApp, testBranding } from './test-utils/testApp';

describe('App', () => {
  let database: MemoryDatabase;

  beforeEach(() => {
    database = new MemoryDatabase();
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const res = await request(createTestApp(database)).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok' });
    });
  });

  describe('GET /init_db', () => {
    it('should create the schema and confirm in plain text', async () => {
      const res = await request(createTestApp(database)).get('/init_db');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
      expect(res.text).toBe('Database initialized successfully');
      expect(database.schemaInitializations).toBe(1);
      expect(database.released).toBe(1);
    });
  });

  describe('GET /static/*', () => {
    it('should serve files from the static directory', async () => {
      const res = await request(createTestApp(database)).get('/static/js/particles.js');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toMatch(/^application\/javascript/);
    });

    it('should return 404 for a missing file', async () => {
      const res = await request(createTestApp(database)).get('/static/background.jpg');

      expect(res.status).toBe(404);
      expect(res.text).toBe('Not found');
    });
  });

  describe('unknown routes', () => {
    it('should return 404', async () => {
      const res = await request(createTestApp(database)).get('/events/all');

      expect(res.status).toBe(404);
      expect(res.text).toBe('Not found');
    });
  });

  describe('security headers', () => {
    it('should send a content security policy that only allows local scripts', async () => {
      const res = await request(createTestApp(database)).get('/health');

      const policy = String(res.headers['content-security-policy']);
      expect(policy).toContain("default-src 'self'");
      expect(policy).toContain("script-src 'self'");
      expect(policy).not.toContain('upgrade-insecure-requests');
      expect(res.headers['x-frame-options']).toBe('DENY');
    });
  });

  describe('branding', () => {
    it('should render the configured branding', async () => {
      const res = await request(
        createTestApp(database, {
          branding: {
            ...testBranding,
            appName: 'Harbour Events',
            authorName: 'Events Team',
            githubUrl: 'https://github.com/example',
          },
        })
      ).get('/');

      expect(res.text).toContain('<h1>Harbour Events</h1>');
      expect(res.text).toContain('Made with ❤️ by <strong>Events Team</strong>');
      expect(res.text).toContain('href="https://github.com/example"');
      expect(res.text).not.toContain('linkedin-original.svg');
    });
  });

  describe('rate limiting', () => {
    it('should refuse requests past the configured limit', async () => {
      const app = createTestApp(database, { rateLimit: { windowMs: 60_000, max: 2 } });

      await request(app).get('/health');
      await request(app).get('/health');
      const res = await request(app).get('/health');

      expect(res.status).toBe(429);
      expect(res.text).toBe('Too many requests from this IP');
    });

    it('should not count static files against the limit', async () => {
      const app = createTestApp(database, { rateLimit: { windowMs: 60_000, max: 2 } });

      for (let i = 0; i < 5; i++) {
        const asset = await request(app).get('/static/js/particles.js');
        expect(asset.status).toBe(200);
      }
      const first = await request(app).get('/health');
      const second = await request(app).get('/health');

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
    });

    it('should let an organizer check in a full guest list with the default limit', async () => {
      const app = createApp({ storeProvider: database.provider });
      const event = database.insertEvent({ title: 'Reunion 2026' });
      const guests = Array.from({ length: 60 }, (_, i) =>
        database.insertAttendee(event.id, {
          name: `Guest ${i + 1}`,
          email: '',
          phone: '',
          status: 'Attending',
        })
      );

      for (const guest of guests) {
        const toggle = await request(app).get(`/attendee/${guest.id}/toggle_checkin`);
        expect(toggle.status).toBe(302);

        const detail = await request(app).get(toggle.headers.location);
        expect(detail.status).toBe(200);

        await request(app).get('/static/js/particles.js').expect(200);
        await request(app).get('/static/background.svg').expect(200);
      }

      expect(database.attendees.every((attendee) => attendee.checked_in)).toBe(true);
    }, 30_000);
  });

  describe('request bodies', () => {
    it('should refuse a form larger than 10kb', async () => {
      const res = await request(createTestApp(database))
        .post('/event/new')
        .type('form')
        .send({ title: 'A'.repeat(20_000) });

      expect(res.status).toBe(413);
      expect(database.events).toHaveLength(0);
    });
  });
});
