export const PARSER_NAME = 'card-statement-parser';

export const PARSER_VERSION = '1.0.0';

export const OUTPUT_SCHEMA_VERSION = '1.0.0';

/** Prefix applied to every extracted amount. Statements from all supported issuers are INR. */
export const CURRENCY_SYMBOL = '₹';

/** Separator between the endpoints of a two-group date range. */
export const RANGE_SEPARATOR = ' - ';

/** Trimmed text shorter than this is rejected as NoText. */
export const MIN_TEXT_LENGTH = 50;

/** Extracted text shorter than this probably came from a scanned document and needs OCR. */
export const SPARSE_TEXT_THRESHOLD = 100;

export const LAST_DIGITS_LENGTH = 4;
