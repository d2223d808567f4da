export {
  validateOutput,
  validateAndThrow,
  formatValidationErrors,
  getOutputSchema,
  getOutputSchemaPath,
} from './ajv-validator.js';

export type { ValidationResult, ValidationError } from './ajv-validator.js';
