import path from 'node:path';
import { z } from 'zod';
import { ORG_ATTRIBUTE_FIELDS, type OrgAttributeField } from '../types';
import { booleanVar, loadEnvConfig, stringListVar, stringVar, type EnvSource } from './envConfig';

export const DEFAULT_TIMEZONE = 'Europe/Berlin';
export const DEFAULT_AGGREGATE_DIMENSIONS: OrgAttributeField[] = ['orgDivision', 'orgRegion'];

export interface PipelineConfig {
  inputDir: string;
  dataDir: string;
  outputDir: string;
  databaseFile: string;
  snapshotFile: string;
  contentCatalogFile: string;
  timeZone: string;
  aggregateDimensions: OrgAttributeField[];
  anonymizedExport: boolean;
  logLevel: string;
}

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const ORG_ATTRIBUTE_NAMES: ReadonlySet<string> = new Set<string>(ORG_ATTRIBUTE_FIELDS);

function isOrgAttributeField(value: string): value is OrgAttributeField {
  return ORG_ATTRIBUTE_NAMES.has(value);
}

export function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const pipelineEnvSchema = z
  .object({
    PIPELINE_INPUT_DIR: stringVar({ defaultValue: 'input' }),
    PIPELINE_DATA_DIR: stringVar({ defaultValue: 'data' }),
    PIPELINE_OUTPUT_DIR: stringVar({ defaultValue: 'output' }),
    PIPELINE_DATABASE_FILE: stringVar(),
    PIPELINE_SNAPSHOT_FILE: stringVar(),
    PIPELINE_CONTENT_CATALOG_FILE: stringVar(),
    PIPELINE_TIMEZONE: stringVar({ defaultValue: DEFAULT_TIMEZONE }).refine(
      (value) => value === undefined || isValidTimeZone(value),
      { message: 'must be an IANA time zone name' }
    ),
    PIPELINE_AGGREGATE_DIMENSIONS: stringListVar({ defaultValue: DEFAULT_AGGREGATE_DIMENSIONS, unique: true })
      .superRefine((values, ctx) => {
        for (const value of values) {
          if (!isOrgAttributeField(value)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `unknown organizational attribute '${value}'. Expected one of: ${ORG_ATTRIBUTE_FIELDS.join(', ')}`
            });
          }
        }
      }),
    PIPELINE_ANONYMIZED_EXPORT: booleanVar({ defaultValue: true }),
    PIPELINE_LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true }).refine(
      (value) => value === undefined || LOG_LEVELS.has(value),
      { message: `must be one of ${[...LOG_LEVELS].join(', ')}` }
    )
  })
  .passthrough();

export type LoadPipelineConfigOptions = {
  env?: EnvSource;
  cwd?: string;
};

export function loadPipelineConfig(options: LoadPipelineConfigOptions = {}): PipelineConfig {
  const env = loadEnvConfig(pipelineEnvSchema, { env: options.env, context: 'engagement-pipeline' });
  const cwd = options.cwd ?? process.cwd();

  const inputDir = path.resolve(cwd, env.PIPELINE_INPUT_DIR ?? 'input');
  const dataDir = path.resolve(cwd, env.PIPELINE_DATA_DIR ?? 'data');
  const outputDir = path.resolve(cwd, env.PIPELINE_OUTPUT_DIR ?? 'output');

  return {
    inputDir,
    dataDir,
    outputDir,
    databaseFile: path.resolve(cwd, env.PIPELINE_DATABASE_FILE ?? path.join(dataDir, 'events.db')),
    snapshotFile: path.resolve(cwd, env.PIPELINE_SNAPSHOT_FILE ?? path.join(dataDir, 'org_snapshots.parquet')),
    contentCatalogFile: path.resolve(
      cwd,
      env.PIPELINE_CONTENT_CATALOG_FILE ?? path.join(outputDir, 'content_catalog.parquet')
    ),
    timeZone: env.PIPELINE_TIMEZONE ?? DEFAULT_TIMEZONE,
    aggregateDimensions: env.PIPELINE_AGGREGATE_DIMENSIONS.filter(isOrgAttributeField),
    anonymizedExport: env.PIPELINE_ANONYMIZED_EXPORT ?? true,
    logLevel: env.PIPELINE_LOG_LEVEL ?? 'info'
  } satisfies PipelineConfig;
}
