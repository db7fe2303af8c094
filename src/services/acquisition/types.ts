/**
 * Shared types for the gift acquisition engine.
 */

/** A numeric platform id or a handle (stored without the leading @). */
export type Recipient = number | string;

export interface Item {
  id: string;
  /** Price in stars. */
  price: number;
  isLimited: boolean;
  isSoldOut: boolean;
  /** Total supply cap. Only meaningful for limited items. */
  totalAmount?: number;
  remainingAmount?: number;
  /** Present only for upgradable items. */
  upgradePrice?: number;
}

/** Item plus its distance from the end of the current catalog ordering. */
export interface PositionedItem extends Item {
  position: number;
}

export interface AcquisitionRange {
  minPrice: number;
  maxPrice: number;
  supplyLimit: number;
  quantity: number;
  recipients: Recipient[];
}

export interface AcquisitionRules {
  ranges: AcquisitionRange[];
  purchaseOnlyUpgradable: boolean;
  prioritizeLowSupply: boolean;
}

export interface AcquisitionSettings extends AcquisitionRules {
  pollIntervalMs: number;
  purchaseSpacingMs: number;
}

export type ExclusionReason =
  | 'sold_out'
  | 'non_limited_blocked'
  | 'non_upgradable_blocked'
  | 'range_error';

export type EligibilityVerdict =
  | { eligible: true; quantity: number; recipients: Recipient[] }
  | { eligible: false; exclusionReason: Exclude<ExclusionReason, 'range_error'> }
  | { eligible: false; exclusionReason: 'range_error'; price: number; totalAmount: number };

export type PurchaseErrorCategory =
  | 'balance_too_low'
  | 'usage_limited'
  | 'invalid_recipient'
  | 'unclassified';

export interface ClassifiedPurchaseError {
  category: PurchaseErrorCategory;
  /** Raw error text, kept for the generic notification. */
  message: string;
  code?: string;
}

export type PurchaseOutcome =
  | { kind: 'success'; recipient: Recipient; currentIndex: number; totalRequested: number }
  | { kind: 'partial_failure'; recipient: Recipient; reason: ClassifiedPurchaseError; purchasedSoFar: number }
  | { kind: 'aborted'; reason: 'insufficient_balance' | 'cancelled'; recipient: Recipient };

/** What one recipient's purchase sequence was allowed to spend. */
export interface RecipientBudget {
  recipient: Recipient;
  price: number;
  balance: number;
  affordableQuantity: number;
}

export interface AcquisitionReport {
  itemId: string;
  /** Units requested per recipient. */
  requestedQuantity: number;
  purchasedUnits: number;
  budgets: RecipientBudget[];
  outcomes: PurchaseOutcome[];
}

export interface RecipientInfo {
  displayReference: string;
  handle: string;
}

/**
 * The platform collaborator. Implementations wrap a remote client; every
 * method except `isConnected` may reject.
 */
export interface GiftPlatform {
  isConnected(): boolean;
  connect(): Promise<void>;
  listAvailableItems(): Promise<Item[]>;
  getBalance(): Promise<number>;
  resolveRecipient(recipient: Recipient): Promise<RecipientInfo>;
  purchase(recipient: Recipient, itemId: string, quantity?: number): Promise<void>;
}

export interface ExclusionTally {
  soldOut: number;
  nonLimited: number;
  nonUpgradable: number;
}

export type AcquisitionEvent =
  | { type: 'engine_started'; rangeCount: number; pollIntervalMs: number }
  | { type: 'item_excluded'; item: Item; verdict: Extract<EligibilityVerdict, { eligible: false }> }
  | {
      type: 'unit_purchased';
      itemId: string;
      recipient: RecipientInfo;
      currentIndex: number;
      totalRequested: number;
    }
  | {
      type: 'purchase_failed';
      itemId: string;
      recipient: RecipientInfo;
      error: ClassifiedPurchaseError;
      price: number;
      balance: number;
    }
  | {
      type: 'insufficient_balance';
      itemId: string;
      recipient: RecipientInfo;
      price: number;
      balance: number;
      requestedQuantity: number;
    }
  | {
      type: 'partial_purchase';
      itemId: string;
      recipient: RecipientInfo;
      purchased: number;
      requested: number;
      shortfall: number;
      remainingBalance: number;
    }
  | { type: 'cycle_summary'; newItems: number; tally: ExclusionTally }
  | { type: 'cycle_failed'; stage: CycleStage; message: string };

export type CycleStage = 'connect' | 'load_snapshot' | 'fetch_catalog' | 'save_snapshot';

export interface Notifier {
  notify(event: AcquisitionEvent): Promise<void>;
}
