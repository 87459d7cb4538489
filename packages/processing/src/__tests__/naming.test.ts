import { describe, it, expect } from 'vitest';
import { baseNameFromImage, jobTimestamp, nameFromBase } from '../naming.js';

const NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));

describe('baseNameFromImage()', () => {
  it('takes the repository name from a registry URI', () => {
    expect(baseNameFromImage('123456789012.dkr.ecr.us-west-2.amazonaws.com/my-image:latest')).toBe('my-image');
  });

  it('handles nested repositories', () => {
    expect(baseNameFromImage('registry.example.com/team/sub/processor:1.0')).toBe('processor');
  });

  it('handles a registry with a port', () => {
    expect(baseNameFromImage('localhost:5000/scratch')).toBe('scratch');
  });

  it('returns a bare name unchanged', () => {
    expect(baseNameFromImage('sklearn')).toBe('sklearn');
  });
});

describe('jobTimestamp()', () => {
  it('formats UTC time with milliseconds', () => {
    expect(jobTimestamp(NOW)).toBe('2024-01-02-03-04-05-006');
  });
});

describe('nameFromBase()', () => {
  it('appends the timestamp', () => {
    expect(nameFromBase('my-image', { now: NOW })).toBe('my-image-2024-01-02-03-04-05-006');
  });

  it('trims long bases to fit 63 characters', () => {
    const name = nameFromBase('a'.repeat(100), { now: NOW });
    expect(name).toBe(`${'a'.repeat(39)}-2024-01-02-03-04-05-006`);
    expect(name).toHaveLength(63);
  });

  it('honours a custom max length', () => {
    expect(nameFromBase('abcdefghij', { now: NOW, maxLength: 30 })).toBe('abcdef-2024-01-02-03-04-05-006');
  });
});
