import dotenv from 'dotenv';
import { Branding } from '../types';

dotenv.config();

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export interface RateLimitConfig {
  windowMs: number;
  max: number;
}

const branding: Branding = {
  appName: process.env.APP_NAME || 'Event RSVP Planner',
  footerTagline:
    process.env.FOOTER_TAGLINE || 'Plan events, collect RSVPs and check guests in',
  authorName: process.env.AUTHOR_NAME || '',
  githubUrl: process.env.GITHUB_URL || '',
  linkedinUrl: process.env.LINKEDIN_URL || '',
};

export const config = {
  port: toInt(process.env.PORT, 3013),
  nodeEnv: process.env.NODE_ENV || 'development',
  databaseUrl: process.env.DATABASE_URL || 'postgres://localhost:5432/event_rsvp',
  pool: {
    max: toInt(process.env.PGPOOL_MAX, 10),
    idleTimeoutMillis: toInt(process.env.PGPOOL_IDLE_TIMEOUT_MS, 30000),
  },
  rateLimit: {
    windowMs: toInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000),
    max: toInt(process.env.RATE_LIMIT_MAX, 1000),
  } satisfies RateLimitConfig,
  branding,
};
