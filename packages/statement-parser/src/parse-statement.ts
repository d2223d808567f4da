import {
  ParserOptionsSchema,
  type ExtractionOutcome,
  type ParserOptionsInput,
} from '@cardparse/types';
import { detectAllBanks, detectBank } from './detector.js';
import { DEFAULT_REGISTRY, getSupportedIssuers, type ProfileRegistry } from './registry.js';

/**
 * Turn raw statement text into a parsed statement or a failure.
 *
 * Fails with `NoText` when the trimmed text is shorter than `minTextLength`, and with
 * `BankNotDetected` when no profile accepts it. Otherwise every field is extracted;
 * fields no rule could find are null.
 */
export function parseStatementText(
  text: string,
  options: ParserOptionsInput = {},
  registry: ProfileRegistry = DEFAULT_REGISTRY
): ExtractionOutcome {
  const { minTextLength } = ParserOptionsSchema.parse(options);
  const length = text.trim().length;

  if (length === 0) {
    return {
      ok: false,
      error: { kind: 'NoText', message: 'No text was supplied to the parser' },
    };
  }

  if (length < minTextLength) {
    return {
      ok: false,
      error: {
        kind: 'NoText',
        message: `Only ${length} characters of text were supplied, at least ${minTextLength} are needed. The document may need OCR.`,
      },
    };
  }

  const profile = detectBank(text, registry);
  if (profile === null) {
    const supportedIssuers = getSupportedIssuers(registry);
    return {
      ok: false,
      error: {
        kind: 'BankNotDetected',
        message: `Could not identify the card issuer. Supported issuers: ${supportedIssuers.join(', ')}`,
        supportedIssuers,
      },
    };
  }

  return {
    ok: true,
    statement: {
      issuer: profile.issuerName,
      ...profile.extractAll(text),
    },
    matchedIssuers: detectAllBanks(text, registry).map((p) => p.issuerName),
  };
}
