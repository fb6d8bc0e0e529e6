import fs from 'node:fs';
import path from 'node:path';
import { Ajv, type ValidateFunction } from 'ajv';
import type { ParameterDefinition } from '@pairforge/shared';
import { ParseError, type TestSuite } from '@pairforge/core';
import {
  toParameterDefinitions,
  type ParameterDraft,
} from './parameter-validation.js';

type ParametersFile =
  | Record<string, string[]>
  | { name: string; values: string[] }[];

type SuiteFile =
  | string[][]
  | { testSuite: string[][] }
  | { testCases: { values: string[] }[] };

const stringList = { type: 'array', items: { type: 'string' } } as const;
const rowList = { type: 'array', items: stringList } as const;

const parametersFileSchema = {
  anyOf: [
    {
      type: 'object',
      additionalProperties: stringList,
    },
    {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'values'],
        properties: { name: { type: 'string' }, values: stringList },
        additionalProperties: false,
      },
    },
  ],
} as const;

const suiteFileSchema = {
  anyOf: [
    rowList,
    {
      type: 'object',
      required: ['testSuite'],
      properties: { testSuite: rowList },
    },
    {
      type: 'object',
      required: ['testCases'],
      properties: {
        testCases: {
          type: 'array',
          items: {
            type: 'object',
            required: ['values'],
            properties: { values: stringList },
          },
        },
      },
    },
  ],
} as const;

const ajv = new Ajv({ allErrors: true });
const validateParametersFile: ValidateFunction<ParametersFile> =
  ajv.compile<ParametersFile>(parametersFileSchema);
const validateSuiteFile: ValidateFunction<SuiteFile> =
  ajv.compile<SuiteFile>(suiteFileSchema);

function readJson(filePath: string): unknown {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) {
    throw new ParseError({
      message: `File not found: ${abs}`,
      context: { input: filePath },
    });
  }
  const raw = fs.readFileSync(abs, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ParseError({
      message: `Invalid JSON in ${filePath}`,
      context: { input: filePath },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function assertShape<T>(
  validate: ValidateFunction<T>,
  data: unknown,
  filePath: string,
  expected: string
): T {
  if (validate(data)) {
    return data;
  }
  throw new ParseError({
    message: `Unexpected content in ${filePath}: ${ajv.errorsText(validate.errors, { dataVar: 'file' })}`,
    context: { input: filePath },
    suggestions: [`Expected ${expected}`],
  });
}

/**
 * Load parameters from a JSON file: either `{ "Name": ["v1", "v2"] }` or
 * `[{ "name": "Name", "values": ["v1", "v2"] }]`. Labels go through the same
 * cleanup as `--param`.
 */
export function loadParametersFile(filePath: string): ParameterDefinition[] {
  const data = assertShape(
    validateParametersFile,
    readJson(filePath),
    filePath,
    'an object of string arrays or a list of { name, values }'
  );
  const drafts: ParameterDraft[] = Array.isArray(data)
    ? data.map((entry) => ({ name: entry.name, rawValues: entry.values }))
    : Object.entries(data).map(([name, values]) => ({
        name,
        rawValues: values,
      }));
  return toParameterDefinitions(drafts);
}

/**
 * Load a suite: a bare list of rows, `{ "testSuite": [...] }`, or a JSON
 * suite report written by `generate --out json`.
 */
export function loadSuiteFile(filePath: string): TestSuite {
  const data = assertShape(
    validateSuiteFile,
    readJson(filePath),
    filePath,
    'a list of rows, { testSuite } or a suite report'
  );
  if (Array.isArray(data)) {
    return data;
  }
  if ('testSuite' in data) {
    return data.testSuite;
  }
  return data.testCases.map((testCase) => testCase.values);
}
