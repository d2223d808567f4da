#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile, mkdir } from 'fs/promises';
import { resolve, dirname } from 'path';
import { loadDocumentText, scanForDocuments } from '@cardparse/pdf-extract';
import {
  DEFAULT_REGISTRY,
  detectBank,
  parseStatementText,
  processBatch,
  type FileError,
} from '@cardparse/statement-parser';
import {
  ExtractionOutcomeSchema,
  FIELD_NAMES,
  MIN_TEXT_LENGTH,
  PARSER_VERSION,
  ParserOptionsSchema,
  formatValidationErrors,
  validateOutput,
  type ExtractionOutcome,
  type FileResult,
  type ParserOptions,
  type StatementFileOutput,
} from '@cardparse/types';
import { allInputsFailed, buildOutput, collectWarnings, toFileResult } from './envelope.js';

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

interface CliOptions {
  inputDir?: string;
  out?: string;
  verbose: boolean;
  strict: boolean;
  pretty: boolean;
  minLength: string;
  listBanks: boolean;
}

program
  .name('parse-statement')
  .description('Extract card holder, card digits, billing cycle, due date and amount due from credit card statements')
  .version(PARSER_VERSION)
  .argument('[file]', 'Path to a statement PDF or text file')
  .option('-d, --inputDir <directory>', 'Directory containing statement files to process', process.env['CARD_PARSER_INPUT_DIR'])
  .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['CARD_PARSER_OUTPUT_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('CARD_PARSER_VERBOSE', false))
  .option('-s, --strict', 'Check every outcome against the schema before writing', envBool('CARD_PARSER_STRICT', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('CARD_PARSER_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option(
    '--min-length <chars>',
    'Shortest text (after trimming) the parser will accept',
    process.env['CARD_PARSER_MIN_TEXT_LENGTH'] ?? String(MIN_TEXT_LENGTH)
  )
  .option('--list-banks', 'List supported issuers in detection order and exit', false)
  .action(async (file: string | undefined, options: CliOptions) => {
    try {
      if (options.listBanks) {
        listBanks();
        return;
      }

      const parserOptions = resolveParserOptions(options.minLength);

      if (options.inputDir !== undefined) {
        await processDirectory(options.inputDir, parserOptions, options);
      } else if (file !== undefined) {
        await processSingleFile(file, parserOptions, options);
      } else {
        console.error('[ERROR] Either a statement file or --inputDir must be specified');
        process.exit(1);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

function listBanks(): void {
  for (const [index, profile] of DEFAULT_REGISTRY.entries()) {
    console.log(`${index + 1}. ${profile.issuerName} (${profile.id})`);
    console.log(`   keywords: ${profile.keywords.join(', ')}`);
  }
}

function resolveParserOptions(minLength: string): ParserOptions {
  const parsed = ParserOptionsSchema.safeParse({ minTextLength: Number(minLength) });
  if (!parsed.success) {
    throw new Error(`Invalid --min-length "${minLength}": expected a non-negative integer`);
  }
  return parsed.data;
}

/**
 * Parse one file. The text is loaded here rather than through parseStatementFile so
 * verbose mode can show which rule produced each field.
 */
async function processSingleFile(file: string, parserOptions: ParserOptions, options: CliOptions): Promise<void> {
  const filePath = resolve(file);

  if (options.verbose) {
    console.error(`[INFO] Parsing: ${filePath}`);
    console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
    console.error(`[INFO] Minimum text length: ${parserOptions.minTextLength}`);
    console.error(`[INFO] Strict mode: ${options.strict ? 'enabled' : 'disabled'}`);
  }

  const { text, ...document } = await loadDocumentText(filePath);

  if (options.verbose) {
    console.error(`[INFO] Loaded ${document.pageCount} page(s), ${text.length} characters`);
  }

  const outcome = parseStatementText(text, parserOptions);

  if (options.verbose) {
    logOutcome(document.fileName, outcome);
    const profile = detectBank(text);
    if (profile !== null && outcome.ok) {
      const matches = profile.explain(text);
      for (const field of FIELD_NAMES) {
        const match = matches[field];
        if (match === null) {
          console.error(`[DEBUG]   ${field}: no rule matched`);
        } else {
          const note = match.rule.note !== undefined ? ` (${match.rule.note})` : '';
          console.error(`[DEBUG]   ${field}: rule ${match.ruleIndex}${note} -> ${match.value}`);
        }
      }
    }
  }

  const warnings = collectWarnings(document, outcome);
  const output = buildOutput([toFileResult(document, outcome)], warnings);

  await emit(output, options);
}

async function processDirectory(inputDir: string, parserOptions: ParserOptions, options: CliOptions): Promise<void> {
  const dirPath = resolve(inputDir);

  if (options.verbose) {
    console.error(`[INFO] Batch mode: scanning directory`);
    console.error(`[INFO] Directory: ${dirPath}`);
    console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
    console.error(`[INFO] Strict mode: ${options.strict ? 'enabled' : 'disabled'}`);
  }

  // An unreadable directory throws; the action's catch reports it
  const scanResult = await scanForDocuments(dirPath);

  if (scanResult.files.length === 0) {
    console.error('[ERROR] No statement files (.pdf, .txt) found in directory');
    if (scanResult.skipped.length > 0) {
      console.error('[INFO] Skipped files:');
      for (const skip of scanResult.skipped) {
        console.error(`  - ${skip.fileName}: ${skip.reason}`);
      }
    }
    process.exit(1);
  }

  if (options.verbose) {
    console.error(`[INFO] Found ${scanResult.files.length} statement file(s)`);
    if (scanResult.skipped.length > 0) {
      console.error(`[INFO] Skipped ${scanResult.skipped.length} file(s)`);
    }
  }

  const result = await processBatch(scanResult.files, {
    parserOptions,
    onProgress: (current, total, fileName) => {
      console.error(`[INFO] Parsing ${current}/${total}: ${fileName}`);
    },
    onError: (error: FileError) => {
      const code = error.code !== undefined ? ` (${error.code})` : '';
      console.error(`[ERROR] Failed to read ${error.fileName}${code}: ${error.error}`);
      if (options.verbose && error.stack !== undefined) {
        console.error(error.stack);
      }
    },
  });

  const results: FileResult[] = [];
  const warnings: string[] = [];
  for (const { document, outcome } of result.outcomes) {
    if (options.verbose) {
      logOutcome(document.fileName, outcome);
    }
    results.push(toFileResult(document, outcome));
    warnings.push(...collectWarnings(document, outcome));
  }

  console.error('');
  console.error('=== Batch Processing Summary ===');
  console.error(`Files found:            ${result.summary.totalFilesFound}`);
  console.error(`Statements parsed:      ${result.summary.filesParsed}`);
  console.error(`Extraction failures:    ${result.summary.filesFailedExtraction}`);
  console.error(`Unreadable files:       ${result.summary.filesErrored}`);
  console.error('================================');

  const fileErrors = result.fileErrors.map(({ fileName, filePath, error, timestamp }) => ({
    fileName,
    filePath,
    error,
    timestamp,
  }));

  await emit(buildOutput(results, warnings, fileErrors), options);
}

function logOutcome(fileName: string, outcome: ExtractionOutcome): void {
  if (outcome.ok) {
    console.error(`[INFO] ${fileName}: ${outcome.statement.issuer}`);
  } else {
    console.error(`[WARN] ${fileName}: ${outcome.error.kind}: ${outcome.error.message}`);
  }
}

async function emit(output: StatementFileOutput, options: CliOptions): Promise<void> {
  if (options.strict) {
    for (const { source, outcome } of output.results) {
      const check = ExtractionOutcomeSchema.safeParse(outcome);
      if (!check.success) {
        console.error(`[ERROR] Outcome for ${source.fileName} failed schema validation:`);
        for (const issue of check.error.issues) {
          console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
        }
        process.exit(1);
      }
    }
  }

  const validation = validateOutput(output);
  if (!validation.valid) {
    console.error('[ERROR] Output failed JSON schema validation:');
    for (const line of formatValidationErrors(validation.errors)) {
      console.error(`  - ${line}`);
    }
    process.exit(1);
  }

  if (options.verbose) {
    for (const warning of output.metadata.warnings) {
      console.error(`[WARN] ${warning}`);
    }
  }

  const json = options.pretty ? JSON.stringify(output, null, 2) : JSON.stringify(output);

  if (options.out !== undefined) {
    const outPath = resolve(options.out);
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, json + '\n', 'utf-8');
    if (options.verbose) {
      console.error(`[INFO] Output written to: ${outPath}`);
    }
  } else {
    console.log(json);
  }

  if (allInputsFailed(output)) {
    console.error('[ERROR] No statement could be parsed');
    process.exitCode = 1;
  }
}

program.parseAsync().catch((error: unknown) => {
  console.error(`[ERROR] ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
