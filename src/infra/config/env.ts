/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Default source file names, as published by the upstream data providers.
 */
export const DEFAULT_SOURCE_FILES = {
  imdScores:
    'File_7_-_All_IoD2019_Scores__Ranks__Deciles_and_Population_Denominators_3.csv',
  practicePopulation: 'gp-reg-pat-prac-lsoa-all.csv',
  practiceDirectory: 'epraccur.csv',
  pcnWorkbook: 'ePCN.xlsx',
} as const;

const NonEmptyString = (defaultValue: string) =>
  Type.String({ minLength: 1, default: defaultValue });

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Locations
  DATA_DIR: NonEmptyString('./data'),
  OUTPUT_DIR: NonEmptyString('./outputs'),

  // Source files, relative to DATA_DIR
  IMD_SCORES_FILE: NonEmptyString(DEFAULT_SOURCE_FILES.imdScores),
  PRACTICE_POPULATION_FILE: NonEmptyString(DEFAULT_SOURCE_FILES.practicePopulation),
  PRACTICE_DIRECTORY_FILE: NonEmptyString(DEFAULT_SOURCE_FILES.practiceDirectory),
  PCN_WORKBOOK_FILE: NonEmptyString(DEFAULT_SOURCE_FILES.pcnWorkbook),
});

export type Env = Static<typeof EnvSchema>;

const withDefault = (value: string | undefined, fallback: string): string =>
  value !== undefined && value !== '' ? value : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATA_DIR: withDefault(env['DATA_DIR'], './data'),
    OUTPUT_DIR: withDefault(env['OUTPUT_DIR'], './outputs'),
    IMD_SCORES_FILE: withDefault(env['IMD_SCORES_FILE'], DEFAULT_SOURCE_FILES.imdScores),
    PRACTICE_POPULATION_FILE: withDefault(
      env['PRACTICE_POPULATION_FILE'],
      DEFAULT_SOURCE_FILES.practicePopulation
    ),
    PRACTICE_DIRECTORY_FILE: withDefault(
      env['PRACTICE_DIRECTORY_FILE'],
      DEFAULT_SOURCE_FILES.practiceDirectory
    ),
    PCN_WORKBOOK_FILE: withDefault(env['PCN_WORKBOOK_FILE'], DEFAULT_SOURCE_FILES.pcnWorkbook),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  sources: {
    dataDir: env.DATA_DIR,
    imdScoresFile: env.IMD_SCORES_FILE,
    practicePopulationFile: env.PRACTICE_POPULATION_FILE,
    practiceDirectoryFile: env.PRACTICE_DIRECTORY_FILE,
    pcnWorkbookFile: env.PCN_WORKBOOK_FILE,
  },
  output: {
    dir: env.OUTPUT_DIR,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
