import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import type { ToolExposureMode } from '../config.js';
import { getFileMetadata, normalizeNewlines, readOutputFile } from '../io/files.js';
import { getPackageVersion } from '../meta.js';
import { CALC_TYPES, type ParsedOutput } from '../models/results.js';
import { FIELD_NAMES, PARSER_TABLE, parseOutput, runParser } from '../parsers/dispatch.js';
import { parseMeciDir } from '../parsers/meci.js';
import {
  calculationSucceeded,
  parseCalcType,
  parseEnergySubtype,
  parseTeraChemVersion,
  parseVersionControlDetails,
} from '../parsers/terachem.js';
import {
  SERVER_NAME,
  TC_INFO,
  TC_PARSE_OUTPUT,
  TC_GET_CALCTYPE,
  TC_GET_VERSION,
  TC_CHECK_SUCCESS,
  TC_PARSE_MECI_DIR,
  TC_PARSE_FIELD,
} from '../constants.js';

export type { ToolExposureMode } from '../config.js';
export type ToolExposure = 'standard' | 'full';

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>): Promise<unknown>;
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec<TSchema> {
  return spec;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const sourceFields = {
  path: z.string().min(1).optional().describe('Absolute path to a TeraChem stdout file'),
  text: z.string().min(1).optional().describe('Full text of a TeraChem stdout'),
};

const exactlyOneSource = (v: { path?: string; text?: string }): boolean =>
  (v.path === undefined) !== (v.text === undefined);
const EXACTLY_ONE_SOURCE = { message: 'Exactly one of path or text must be provided' };

const TcInfoSchema = z.object({});

const TcSourceSchema = z.object(sourceFields).refine(exactlyOneSource, EXACTLY_ONE_SOURCE);

const TcParseMeciDirSchema = z.object({
  directory: z.string().min(1).describe('Absolute path to a TeraChem MECI (run conical) scratch directory'),
});

const TcParseFieldSchema = z.object({
  ...sourceFields,
  field: z.enum(FIELD_NAMES).describe('Single field extractor to run'),
}).refine(exactlyOneSource, EXACTLY_ONE_SOURCE);

function readSource(params: { path?: string; text?: string }): string {
  return params.path !== undefined ? readOutputFile(params.path) : normalizeNewlines(params.text ?? '');
}

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: TC_INFO,
    description: 'Return server version, supported calculation types and the field extractors run for each.',
    exposure: 'standard',
    zodSchema: TcInfoSchema,
    handler: async () => ({
      name: SERVER_NAME,
      version: getPackageVersion(),
      calctypes: CALC_TYPES,
      extractors: PARSER_TABLE.map(entry => entry.name),
      fields: FIELD_NAMES,
    }),
  }),
  defineTool({
    name: TC_PARSE_OUTPUT,
    description: 'Parse a TeraChem stdout: classify the calculation and extract energy, gradient, Hessian, excited-state energies, atom and orbital counts, version and success.',
    exposure: 'standard',
    zodSchema: TcSourceSchema,
    handler: async (params) => {
      const parsed = parseOutput(readSource(params));
      if (params.path === undefined) return parsed;
      return { ...parsed, file: await getFileMetadata(params.path) };
    },
  }),
  defineTool({
    name: TC_GET_CALCTYPE,
    description: 'Classify a TeraChem stdout by its banner (energy, gradient, hessian, minimize, coupling, neb) and, for energies, the excited-state method.',
    exposure: 'standard',
    zodSchema: TcSourceSchema,
    handler: async (params) => {
      const text = readSource(params);
      const record: ParsedOutput = { calctype: parseCalcType(text) };
      if (record.calctype === 'energy') parseEnergySubtype(text, record);
      return record;
    },
  }),
  defineTool({
    name: TC_GET_VERSION,
    description: 'Return the TeraChem build version and its Git commit or Hg tag, formatted like `terachem --version`.',
    exposure: 'standard',
    zodSchema: TcSourceSchema,
    handler: async (params) => {
      const text = readSource(params);
      const terachemVersion = parseTeraChemVersion(text);
      const vcsId = parseVersionControlDetails(text);
      return {
        version: `${terachemVersion} [${vcsId}]`,
        terachem_version: terachemVersion,
        vcs_id: vcsId,
      };
    },
  }),
  defineTool({
    name: TC_CHECK_SUCCESS,
    description: 'Report whether a TeraChem run finished (the "Job finished:" banner is present).',
    exposure: 'standard',
    zodSchema: TcSourceSchema,
    handler: async (params) => ({ success: calculationSucceeded(readSource(params)) }),
  }),
  defineTool({
    name: TC_PARSE_MECI_DIR,
    description: 'Parse a TeraChem MECI directory (meci_conformers.xyz + meci.out) into an optimization result: trajectory, final structure, final energy and lower/upper state energies per step.',
    exposure: 'standard',
    zodSchema: TcParseMeciDirSchema,
    handler: async (params) => parseMeciDir(params.directory),
  }),
  defineTool({
    name: TC_PARSE_FIELD,
    description: 'Run a single field extractor against a TeraChem stdout, regardless of calculation type.',
    exposure: 'full',
    zodSchema: TcParseFieldSchema,
    handler: async (params) => runParser(params.field, readSource(params)),
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
