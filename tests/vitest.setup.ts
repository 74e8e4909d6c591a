/**
 * Vitest setup file
 * This file runs before each test file
 */

import { beforeAll, afterAll } from 'vitest';
import { resetParser } from '../src/parser/index.js';

// Reset the shared parser before tests
beforeAll(() => {
  resetParser();
});

afterAll(() => {
  resetParser();
});
