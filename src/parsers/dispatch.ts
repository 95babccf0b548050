import { internalError, MatchNotFoundError } from '../shared/index.js';
import type { CalcType, EnergySubtype, ParsedOutput } from '../models/results.js';
import {
  calculationSucceeded,
  parseCalcType,
  parseCisEnergies,
  parseCisNumstates,
  parseEnergy,
  parseEnergySubtype,
  parseEomCcsdEnergies,
  parseEomCcsdNumstates,
  parseGradient,
  parseHessian,
  parseMeciEnergies,
  parseNatoms,
  parseNmo,
  parseVersionString,
  type Extractor,
} from './terachem.js';

export const FIELD_NAMES = [
  'energy',
  'energy_subtype',
  'cis_numstates',
  'cis_energies',
  'eom_ccsd_numstates',
  'eom_ccsd_energies',
  'gradient',
  'hessian',
  'natoms',
  'nmo',
  'meci_energies',
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

interface FieldParser {
  name: FieldName;
  parse: Extractor;
  /** Fields that must be on the record before this one runs. */
  requires?: FieldName[];
}

export interface ParserEntry extends FieldParser {
  appliesTo: (calctype: CalcType, record: ParsedOutput) => boolean;
}

const always = (): boolean => true;
const onlyFor = (...calctypes: CalcType[]) =>
  (calctype: CalcType): boolean => calctypes.includes(calctype);
const onlySubtype = (subtype: EnergySubtype) =>
  (_calctype: CalcType, record: ParsedOutput): boolean => record.energy_subtype === subtype;

/**
 * Extractors in run order. Subtype entries read `energy_subtype`, so they sit
 * after the subtype classifier; EOM-CCSD energies need the state count first.
 */
export const PARSER_TABLE: readonly ParserEntry[] = [
  { name: 'energy', appliesTo: always, parse: parseEnergy },
  { name: 'energy_subtype', appliesTo: onlyFor('energy'), parse: parseEnergySubtype },
  { name: 'cis_numstates', appliesTo: onlySubtype('energy_cis'), parse: parseCisNumstates },
  { name: 'cis_energies', appliesTo: onlySubtype('energy_cis'), parse: parseCisEnergies },
  { name: 'eom_ccsd_numstates', appliesTo: onlySubtype('energy_eom_ccsd'), parse: parseEomCcsdNumstates },
  {
    name: 'eom_ccsd_energies',
    appliesTo: onlySubtype('energy_eom_ccsd'),
    parse: parseEomCcsdEnergies,
    requires: ['eom_ccsd_numstates'],
  },
  { name: 'gradient', appliesTo: onlyFor('gradient', 'hessian'), parse: parseGradient },
  { name: 'hessian', appliesTo: onlyFor('hessian'), parse: parseHessian },
  { name: 'natoms', appliesTo: always, parse: parseNatoms },
  { name: 'nmo', appliesTo: always, parse: parseNmo },
];

// MECI runs carry no calctype banner of their own; reachable through runParser only.
const STANDALONE_PARSERS: readonly FieldParser[] = [
  {
    name: 'meci_energies',
    parse: (text, record) => {
      parseMeciEnergies(text, record);
    },
  },
];

function getFieldParser(name: FieldName): FieldParser {
  const entry = [...PARSER_TABLE, ...STANDALONE_PARSERS].find(e => e.name === name);
  if (!entry) throw internalError(`No extractor registered for ${name}`);
  return entry;
}

/**
 * Classify a TeraChem stdout and run every applicable extractor.
 * Any extractor error propagates; the version string is optional because
 * truncated logs may lack the header.
 */
export function parseOutput(text: string): ParsedOutput {
  const calctype = parseCalcType(text);
  const record: ParsedOutput = { calctype };

  for (const entry of PARSER_TABLE) {
    if (entry.appliesTo(calctype, record)) {
      entry.parse(text, record);
    }
  }

  try {
    record.version = parseVersionString(text);
  } catch (err) {
    if (!(err instanceof MatchNotFoundError)) throw err;
  }
  record.success = calculationSucceeded(text);
  return record;
}

/** Run one named extractor (and its prerequisites) on a fresh record. */
export function runParser(name: FieldName, text: string): ParsedOutput {
  const record: ParsedOutput = {};
  const entry = getFieldParser(name);
  for (const dependency of entry.requires ?? []) {
    getFieldParser(dependency).parse(text, record);
  }
  entry.parse(text, record);
  return record;
}
