import { describe, it, expect } from 'vitest';
import { parseXyzFrames } from '../models/xyz.js';
import { McpError } from '../shared/index.js';

const TWO_FRAMES = [
  '3',
  'frame 0 -76.38',
  'O   0.000000   0.000000  -0.065775',
  'H   0.000000  -0.759061   0.521953',
  'H   0.000000   0.759061   0.521953',
  '3',
  'frame 1 -76.39',
  'O   0.000000   0.000000  -0.070000',
  'H   0.000000  -0.750000   0.520000',
  'H   0.000000   0.750000   0.520000',
  '',
].join('\n');

describe('parseXyzFrames', () => {
  it('reads every frame with its comment line', () => {
    const frames = parseXyzFrames(TWO_FRAMES);
    expect(frames).toHaveLength(2);
    expect(frames[0]?.symbols).toEqual(['O', 'H', 'H']);
    expect(frames[0]?.comment).toBe('frame 0 -76.38');
    expect(frames[1]?.geometry_angstrom[1]).toEqual([0, -0.75, 0.52]);
  });

  it('accepts CRLF line endings', () => {
    expect(parseXyzFrames(TWO_FRAMES.replace(/\n/g, '\r\n'))).toHaveLength(2);
  });

  it('returns no frames for empty input', () => {
    expect(parseXyzFrames('\n\n')).toEqual([]);
  });

  it('rejects a frame with too few atom lines', () => {
    try {
      parseXyzFrames('3\ncomment\nO 0 0 0\nH 0 0 1\n');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(McpError);
      expect((err as McpError).message).toBe('Invalid XYZ atom line 5 in frame 1');
    }
  });

  it('rejects a non-numeric atom count', () => {
    expect(() => parseXyzFrames('three\ncomment\n')).toThrow('Invalid XYZ atom count on line 1: "three"');
  });
});
