import { AppOptions, createApp } from '../app';
import { Branding } from '../types';
import { MemoryDatabase } from './memoryStore';

export const testBranding: Branding = {
  appName: 'Test Planner',
  footerTagline: 'Test footer',
  authorName: '',
  githubUrl: '',
  linkedinUrl: '',
};

export const createTestApp = (database: MemoryDatabase, options: Partial<AppOptions> = {}) =>
  createApp({
    storeProvider: database.provider,
    branding: testBranding,
    rateLimit: { windowMs: 60_000, max: 1000 },
    ...options,
  });
