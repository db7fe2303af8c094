/**
 * Eligibility evaluation: exclusion rules, then range matching.
 * Pure function, no I/O.
 */

import { matchRange } from './range-matcher.js';
import type { AcquisitionRules, EligibilityVerdict, ExclusionReason, ExclusionTally, Item } from './types.js';

type RuleReason = Exclude<ExclusionReason, 'range_error'>;

interface ExclusionRule {
  reason: RuleReason;
  test: (item: Item, rules: Pick<AcquisitionRules, 'purchaseOnlyUpgradable'>) => boolean;
}

/**
 * Checked in order; the first rule that fires decides the verdict.
 * Sold-out and non-limited must stay ahead of anything price related.
 */
const EXCLUSION_RULES: readonly ExclusionRule[] = [
  { reason: 'sold_out', test: (item) => item.isSoldOut },
  { reason: 'non_limited_blocked', test: (item) => !item.isLimited },
  {
    reason: 'non_upgradable_blocked',
    test: (item, rules) => rules.purchaseOnlyUpgradable && item.upgradePrice === undefined,
  },
];

export function evaluateItem(item: Item, rules: AcquisitionRules): EligibilityVerdict {
  const failed = EXCLUSION_RULES.find((rule) => rule.test(item, rules));
  if (failed) {
    return { eligible: false, exclusionReason: failed.reason };
  }

  const totalAmount = item.isLimited ? item.totalAmount ?? 0 : 0;
  const match = matchRange(item.price, totalAmount, rules.ranges);

  if (!match.matched) {
    return { eligible: false, exclusionReason: 'range_error', price: item.price, totalAmount };
  }

  return { eligible: true, quantity: match.quantity, recipients: match.recipients };
}

/**
 * Count exclusion categories across a batch. Each rule is counted on its own,
 * so a sold-out non-limited item adds to both counters.
 */
export function tallyExclusions(
  items: Iterable<Item>,
  rules: Pick<AcquisitionRules, 'purchaseOnlyUpgradable'>,
): ExclusionTally {
  const tally: ExclusionTally = { soldOut: 0, nonLimited: 0, nonUpgradable: 0 };
  const counters: Record<RuleReason, keyof ExclusionTally> = {
    sold_out: 'soldOut',
    non_limited_blocked: 'nonLimited',
    non_upgradable_blocked: 'nonUpgradable',
  };

  for (const item of items) {
    for (const rule of EXCLUSION_RULES) {
      if (rule.test(item, rules)) tally[counters[rule.reason]]++;
    }
  }

  return tally;
}
