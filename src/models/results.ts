import type { Structure } from './xyz.js';

export const ENERGY_SUBTYPES = [
  'energy_cis',
  'energy_eom_ccsd',
  'energy_cas',
  'energy_hhtda',
] as const;

export const CALC_TYPES = [
  'energy',
  'gradient',
  'hessian',
  'minimize',
  'coupling',
  'neb',
  'md',
  'meci',
  ...ENERGY_SUBTYPES,
] as const;

export type CalcType = (typeof CALC_TYPES)[number];
export type EnergySubtype = (typeof ENERGY_SUBTYPES)[number];

/**
 * Fields accumulated from one TeraChem stdout.
 *
 * Every member is optional: a field is only present when the calculation type
 * produces it and the matching extractor ran.
 */
export interface ParsedOutput {
  calctype?: CalcType;
  energy?: number;
  energy_subtype?: EnergySubtype;
  calcinfo_natoms?: number;
  calcinfo_nmo?: number;
  gradient?: number[][];
  hessian?: number[][];
  cis_numstates?: number;
  cis_energies?: number[];
  eom_ccsd_numstates?: number;
  eom_ccsd_energies?: number[];
  lower_state_energies?: number[];
  upper_state_energies?: number[];
  version?: string;
  success?: boolean;
}

export interface OptimizationResult {
  calctype: 'meci';
  final_energy: number;
  lower_state_energies: number[];
  upper_state_energies: number[];
  trajectory: Structure[];
  final_structure: Structure;
}
