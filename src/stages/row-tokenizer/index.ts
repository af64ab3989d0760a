/**
 * Row Tokenizer
 *
 * Splits each detection's text into numeric values and a name fragment.
 * A span that is all digits once `,` and `.` are removed is one number
 * (thousands separators); anything else yields every digit run as its own
 * number, which separates names fused to stats ("Ztee16" -> "Ztee", "16").
 * Any Unicode decimal digit counts; numbers are NFKC-normalized so fullwidth
 * digits ("１６") come out as ASCII.
 */

import type { Row, RowTokens } from '../../types';

const SEPARATORS = /[,.]/g;
const ALL_DIGITS = /^\p{Nd}+$/u;
const DIGIT_RUN = /\p{Nd}+/gu;

function toNumberToken(digits: string): string {
  return digits.normalize('NFKC');
}

export interface TextTokens {
  numbers: string[];
  nameFragment: string | null;
}

export function tokenizeText(text: string): TextTokens {
  const compact = text.replace(SEPARATORS, '');
  if (ALL_DIGITS.test(compact)) {
    return { numbers: [toNumberToken(compact)], nameFragment: null };
  }

  const numbers = text.match(DIGIT_RUN) ?? [];
  const remainder = text.replace(DIGIT_RUN, '').trim();

  return {
    numbers: numbers.map(toNumberToken),
    // a lone "|" or "x" beside a number is not a name
    nameFragment: remainder.length > 1 ? remainder : null,
  };
}

export function tokenizeRow(row: Row): RowTokens {
  const numbers: string[] = [];
  const fragments: string[] = [];

  for (const detection of row.detections) {
    const tokens = tokenizeText(detection.text);
    numbers.push(...tokens.numbers);
    if (tokens.nameFragment !== null) {
      fragments.push(tokens.nameFragment);
    }
  }

  return { numbers, nameCandidate: fragments.join(' ') };
}
