import * as fs from 'fs';
import * as path from 'path';
import { readOutputFile, validateDirectory } from '../io/files.js';
import type { OptimizationResult, ParsedOutput } from '../models/results.js';
import { parseXyzFrames } from '../models/xyz.js';
import { malformedOutput, notFound } from '../shared/index.js';
import { parseFinalEnergy, parseMeciEnergies } from './terachem.js';

export const MECI_STRUCTURES_FILENAME = 'meci_conformers.xyz';
export const MECI_OUTPUT_FILENAME = 'meci.out';

function requireFile(directory: string, filename: string): string {
  const filePath = path.join(directory, filename);
  if (!fs.existsSync(filePath)) {
    throw notFound(`MECI directory is missing ${filename}`, { directory, filename });
  }
  return filePath;
}

/**
 * Collect a TeraChem MECI (run conical) directory into one optimization
 * result: every structure in meci_conformers.xyz, plus the final energy and
 * per-step state energies from meci.out.
 */
export function parseMeciDir(directory: string): OptimizationResult {
  const dir = validateDirectory(directory);

  const trajectory = parseXyzFrames(readOutputFile(requireFile(dir, MECI_STRUCTURES_FILENAME)));
  const finalStructure = trajectory[trajectory.length - 1];
  if (!finalStructure) {
    throw malformedOutput(`${MECI_STRUCTURES_FILENAME} holds no structures`, { directory: dir });
  }

  const text = readOutputFile(requireFile(dir, MECI_OUTPUT_FILENAME));
  const record: ParsedOutput = {};
  const [lower, upper] = parseMeciEnergies(text, record);

  return {
    calctype: 'meci',
    final_energy: parseFinalEnergy(text),
    lower_state_energies: lower,
    upper_state_energies: upper,
    trajectory,
    final_structure: finalStructure,
  };
}
