import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

export const FIXTURES_DIR = fileURLToPath(new URL('./fixtures/', import.meta.url));

export function fixturePath(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

export function readFixture(name: string): string {
  return fs.readFileSync(fixturePath(name), 'utf-8');
}

export const WATER_GRADIENT = [
  [0, 0, -0.0132304013],
  [0, 0.0198813117, 0.0066152006],
  [0, -0.0198813117, 0.0066152006],
];

/** Entries of the 9x9 fixture Hessian: alternating sign, (i+1)(j+1)/64. */
export const WATER_HESSIAN = Array.from({ length: 9 }, (_, i) =>
  Array.from({ length: 9 }, (_, j) => ((i + j) % 2 ? -1 : 1) * ((i + 1) * (j + 1)) / 64),
);
