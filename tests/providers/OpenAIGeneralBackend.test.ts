import { describe, it, expect } from 'vitest';
import { stripCodeFence } from '../../src/providers/OpenAIGeneralBackend.js';

describe('stripCodeFence', () => {
  it('should return the body of a fenced block', () => {
    expect(stripCodeFence('Here you go:\n```sql\nSELECT 1\n```')).toBe('SELECT 1');
  });

  it('should accept a fence without a language tag', () => {
    expect(stripCodeFence('```\nFIREBASE_QUERY: staff\n```')).toBe('FIREBASE_QUERY: staff');
  });

  it('should trim unfenced text', () => {
    expect(stripCodeFence('  SELECT 2 \n')).toBe('SELECT 2');
  });
});
