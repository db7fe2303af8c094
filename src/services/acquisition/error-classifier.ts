/**
 * Purchase failure classification.
 *
 * Structured platform codes are checked first; the message substring match
 * only covers clients that surface nothing but text.
 */

import { PlatformError, getErrorMessage } from '../../utils/errors.js';
import type { ClassifiedPurchaseError, PurchaseErrorCategory } from './types.js';

interface ClassificationRule {
  category: Exclude<PurchaseErrorCategory, 'unclassified'>;
  codes: readonly string[];
  /** Lower-cased fragments matched against the message. */
  fragments: readonly string[];
}

const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { category: 'balance_too_low', codes: ['BALANCE_TOO_LOW'], fragments: ['balance_too_low'] },
  {
    category: 'usage_limited',
    codes: ['STARGIFT_USAGE_LIMITED'],
    fragments: ['stargift_usage_limited'],
  },
  {
    category: 'invalid_recipient',
    codes: ['PEER_ID_INVALID', 'USER_ID_INVALID'],
    fragments: ['peer_id_invalid', 'user_id_invalid', 'chat not found'],
  },
];

export function classifyPurchaseError(error: unknown): ClassifiedPurchaseError {
  const message = getErrorMessage(error);
  const code = error instanceof PlatformError ? error.code : undefined;

  const byCode = code ? CLASSIFICATION_RULES.find((rule) => rule.codes.includes(code)) : undefined;
  if (byCode) return { category: byCode.category, message, code };

  const lowered = message.toLowerCase();
  const byMessage = CLASSIFICATION_RULES.find((rule) =>
    rule.fragments.some((fragment) => lowered.includes(fragment)),
  );

  return {
    category: byMessage?.category ?? 'unclassified',
    message,
    ...(code ? { code } : {}),
  };
}
