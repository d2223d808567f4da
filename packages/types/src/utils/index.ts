export {
  PARSER_NAME,
  PARSER_VERSION,
  OUTPUT_SCHEMA_VERSION,
  CURRENCY_SYMBOL,
  RANGE_SEPARATOR,
  MIN_TEXT_LENGTH,
  SPARSE_TEXT_THRESHOLD,
  LAST_DIGITS_LENGTH,
} from './constants.js';
