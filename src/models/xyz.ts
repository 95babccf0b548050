/**
 * Multi-frame XYZ reader for TeraChem trajectory files
 * (meci_conformers.xyz, optim.xyz).
 *
 * Each frame:
 *   line 1: atom count
 *   line 2: comment (TeraChem writes the frame energy here)
 *   N lines: symbol x y z, in Angstrom
 */

import { malformedOutput } from '../shared/index.js';

export interface Structure {
  symbols: string[];
  geometry_angstrom: number[][];
  comment: string;
}

const ATOM_LINE_RE =
  /^\s*([A-Za-z]{1,3})\s+(-?\d+\.?\d*(?:[eE][+-]?\d+)?)\s+(-?\d+\.?\d*(?:[eE][+-]?\d+)?)\s+(-?\d+\.?\d*(?:[eE][+-]?\d+)?)/;

export function parseXyzFrames(content: string): Structure[] {
  const lines = content.replace(/\r\n?/g, '\n').split('\n');
  const frames: Structure[] = [];

  let index = 0;
  while (index < lines.length) {
    const countLine = (lines[index] ?? '').trim();
    if (countLine.length === 0) {
      index += 1;
      continue;
    }

    const natoms = Number(countLine);
    if (!Number.isInteger(natoms) || natoms <= 0) {
      throw malformedOutput(`Invalid XYZ atom count on line ${index + 1}: "${countLine}"`);
    }

    const comment = (lines[index + 1] ?? '').trim();
    const symbols: string[] = [];
    const geometry: number[][] = [];
    for (let i = 0; i < natoms; i++) {
      const lineNo = index + 2 + i;
      const match = ATOM_LINE_RE.exec(lines[lineNo] ?? '');
      if (!match) {
        throw malformedOutput(`Invalid XYZ atom line ${lineNo + 1} in frame ${frames.length + 1}`);
      }
      const [, symbol, x, y, z] = match;
      symbols.push(symbol ?? '');
      geometry.push([Number(x), Number(y), Number(z)]);
    }

    frames.push({ symbols, geometry_angstrom: geometry, comment });
    index += natoms + 2;
  }

  return frames;
}
