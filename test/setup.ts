/**
 * Test Setup
 * Global test configuration and utilities
 */

import { vi } from 'vitest';
import pino from 'pino';
import { setLogger } from '../src/core/logger.js';

// Mock nanoid for deterministic IDs in tests
vi.mock('nanoid', () => {
  let counter = 0;
  return {
    nanoid: (size?: number) => {
      counter++;
      return String(counter).padStart(size ?? 21, '0');
    },
  };
});

// Keep test runs from writing to ~/.rte/logs
setLogger(pino({ level: 'silent' }));
