/**
 * Field extractors for TeraChem stdout.
 *
 * Each extractor takes the full output text and writes one field of a
 * ParsedOutput. A missing pattern raises MatchNotFoundError; nothing is
 * recovered locally.
 */

import { internalError, MatchNotFoundError } from '../shared/index.js';
import type { CalcType, EnergySubtype, ParsedOutput } from '../models/results.js';
import { captureFloat, captureInt, captureString, regexFindAll, regexSearch } from './regex.js';
import { assertSquare, parseFloatBlock, toTriples } from './matrix.js';

export type Extractor = (text: string, record: ParsedOutput) => void;

// ── Calculation type ──────────────────────────────────────────────────────

// Banner spelling ("OPTMIZATION") is TeraChem's own.
const CALCTYPE_BANNERS: ReadonlyArray<readonly [RegExp, CalcType]> = [
  [/RUNNING GEOMETRY OPTMIZATION/, 'minimize'],
  [/SINGLE POINT NONADIABATIC COUPLING/, 'coupling'],
  [/SEARCHING FOR THE TRANSITION STATE/, 'neb'],
  [/SINGLE POINT ENERGY CALCULATIONS/, 'energy'],
  [/SINGLE POINT GRADIENT CALCULATIONS/, 'gradient'],
  [/FREQUENCY ANALYSIS/, 'hessian'],
];

const ENERGY_SUBTYPE_BANNERS: ReadonlyArray<readonly [RegExp, EnergySubtype]> = [
  [/EOM-CCSD Energies/, 'energy_eom_ccsd'],
  [/Restricted CIS Parameters/, 'energy_cis'],
  [/Restricted hh-TDA Parameters/, 'energy_hhtda'],
  [/Active Space Parameters/, 'energy_cas'],
];

export function parseCalcType(text: string): CalcType {
  for (const [banner, calctype] of CALCTYPE_BANNERS) {
    if (banner.test(text)) return calctype;
  }
  throw new MatchNotFoundError(
    CALCTYPE_BANNERS.map(([banner]) => banner.source).join('|'),
    text,
  );
}

/**
 * Refine a plain energy calculation. Leaves `energy_subtype` unset for
 * single-reference energies; when several banners appear the later table
 * entry wins.
 */
export const parseEnergySubtype: Extractor = (text, record) => {
  for (const [banner, subtype] of ENERGY_SUBTYPE_BANNERS) {
    if (banner.test(text)) record.energy_subtype = subtype;
  }
};

// ── Scalars ───────────────────────────────────────────────────────────────

const ENERGY_RE = /FINAL ENERGY: (-?\d+(?:\.\d+)?)/;

/** Frequency runs print many energies; the first one is the reference geometry. */
export const parseEnergy: Extractor = (text, record) => {
  record.energy = captureFloat(ENERGY_RE, text);
};

export const parseNatoms: Extractor = (text, record) => {
  record.calcinfo_natoms = captureInt(/Total atoms:\s*(\d+)/, text);
};

export const parseNmo: Extractor = (text, record) => {
  record.calcinfo_nmo = captureInt(/Total orbitals:\s*(\d+)/, text);
};

/** First FINAL ENERGY of a text, without a record. */
export function parseFinalEnergy(text: string): number {
  return captureFloat(ENERGY_RE, text);
}

// ── Excited states ────────────────────────────────────────────────────────

export const parseCisNumstates: Extractor = (text, record) => {
  record.cis_numstates = captureInt(/Number of roots to find:\s*(\d+)/, text);
};

// Columns: root, total energy, excitation (eV), osc. strength, s^2, max CI coeff, transition
const CIS_ROW_RE =
  /^\s*\d+\s+(-?\d+\.\d+)\s+\d+\.\d+\s+\d+\.\d+\s+\d+\.\d+\s+-?\d+\.\d+\s+\d+\s*->\s*\d/m;

export const parseCisEnergies: Extractor = (text, record) => {
  const matches = regexFindAll(CIS_ROW_RE, text);
  if (matches.length === 0) throw new MatchNotFoundError(CIS_ROW_RE, text);
  record.cis_energies = matches.map(Number);
};

export const parseEomCcsdNumstates: Extractor = (text, record) => {
  record.eom_ccsd_numstates = captureInt(/Number of states:\s*(\d+)/, text);
};

const EOM_ROOT_RE = /^\s*Root\s+\d+:\s+(-?\d+\.\d+)/m;

/**
 * Root energies of an EOM-CCSD run, ground state first.
 *
 * Davidson iterations print "Root N:" lines too, so only the trailing
 * `eom_ccsd_numstates + 1` matches are final roots. This holds for the
 * layouts seen so far; validate against new fixtures before relying on it.
 */
export const parseEomCcsdEnergies: Extractor = (text, record) => {
  const numstates = record.eom_ccsd_numstates;
  if (numstates === undefined) {
    throw internalError('EOM-CCSD state count must be parsed before root energies');
  }
  const matches = regexFindAll(EOM_ROOT_RE, text);
  if (matches.length === 0) throw new MatchNotFoundError(EOM_ROOT_RE, text);
  // numstates counts excited states only; keep the ground state too
  record.eom_ccsd_energies = matches.slice(-(numstates + 1)).map(Number);
};

// ── Gradient / Hessian ────────────────────────────────────────────────────

// Everything between the dE/dX dE/dY dE/dZ header and the closing ---- line.
const GRADIENT_RE = /(?<=dE\/dX\s{12}dE\/dY\s{12}dE\/dZ\n)[\d.\-\s]+(?=\n-{2,})/;

export const parseGradient: Extractor = (text, record) => {
  const block = regexSearch(GRADIENT_RE, text)[0];
  record.gradient = toTriples(parseFloatBlock(block));
};

function hessianRowRe(label: number): RegExp {
  return new RegExp(String.raw`(?:\s+${label}\s)((?:\s-?\d\.\d{15}e[+-]\d{2})+)`, 'g');
}

/**
 * TeraChem prints the Hessian six columns at a time. Row `k` of the matrix is
 * every line labelled `k`, concatenated across the column blocks; the first
 * label with no line ends the matrix.
 */
export const parseHessian: Extractor = (text, record) => {
  const hessian: number[][] = [];
  for (let label = 1; ; label++) {
    const segments = regexFindAll(hessianRowRe(label), text);
    if (segments.length === 0) break;
    hessian.push(segments.flatMap(parseFloatBlock));
  }

  if (hessian.length === 0) throw new MatchNotFoundError(hessianRowRe(1), text);
  assertSquare(hessian, 'Hessian');
  record.hessian = hessian;
};

// ── MECI ──────────────────────────────────────────────────────────────────

const LOWER_STATE_RE = /Lower state energy:\s*(-?\d+\.\d+)/;
const UPPER_STATE_RE = /Upper state energy:\s*(-?\d+\.\d+)/;

/**
 * Lower/upper state energies of every MECI optimization step, in order.
 * A run killed between the two lines leaves the lower series one longer;
 * both are returned as printed.
 */
export function parseMeciEnergies(text: string, record: ParsedOutput): [number[], number[]] {
  const lower = regexFindAll(LOWER_STATE_RE, text);
  const upper = regexFindAll(UPPER_STATE_RE, text);
  if (lower.length === 0 || upper.length === 0) {
    throw new MatchNotFoundError('Lower or upper state energy', text);
  }
  const lowerEnergies = lower.map(Number);
  const upperEnergies = upper.map(Number);
  record.lower_state_energies = lowerEnergies;
  record.upper_state_energies = upperEnergies;
  return [lowerEnergies, upperEnergies];
}

// ── Version / status ──────────────────────────────────────────────────────

/** Git commit hash, or the tag of older Mercurial builds. */
export function parseVersionControlDetails(text: string): string {
  return captureString(/(Git|Hg) Version: (\S*)/, text, 2);
}

export function parseTeraChemVersion(text: string): string {
  return captureString(/TeraChem (v\S*)/, text);
}

/** Same layout as `terachem --version`, e.g. "v1.9-2022.03-dev [4daa16d]". */
export function parseVersionString(text: string): string {
  return `${parseTeraChemVersion(text)} [${parseVersionControlDetails(text)}]`;
}

export function calculationSucceeded(text: string): boolean {
  return /Job finished:/.test(text);
}
