/**
 * AJV-based JSON Schema validation for the CLI output envelope.
 * The schema lives beside the package in schemas/statement-output.schema.json.
 */

import AjvModule from 'ajv';
import type { ValidateFunction } from 'ajv';
import ajvFormats from 'ajv-formats';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { StatementFileOutput } from '../types/output.js';

const Ajv = AjvModule.default;
const addFormats = ajvFormats.default;

const __dirname = dirname(fileURLToPath(import.meta.url));

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

let compiledValidator: ValidateFunction | null = null;

export function getOutputSchemaPath(): string {
  return resolve(__dirname, '../../schemas/statement-output.schema.json');
}

export function getOutputSchema(): object {
  const content = readFileSync(getOutputSchemaPath(), 'utf-8');
  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Output schema at ${getOutputSchemaPath()} is not a JSON object`);
  }
  return parsed;
}

function getValidator(): ValidateFunction {
  if (compiledValidator === null) {
    const ajv = new Ajv({
      allErrors: true,
      verbose: true,
    });
    addFormats(ajv);
    compiledValidator = ajv.compile(getOutputSchema());
  }
  return compiledValidator;
}

export function validateOutput(output: unknown): ValidationResult {
  const validate = getValidator();
  const valid = validate(output);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

export function validateAndThrow(output: unknown): asserts output is StatementFileOutput {
  const result = validateOutput(output);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`Schema validation failed:\n${errorMessages}`);
  }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => `[${e.keyword}] ${e.path}: ${e.message}`);
}
