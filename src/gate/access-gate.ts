import { getLogger } from '../observability/logger';
import type { GateConfig } from '../config';

/**
 * Failure timestamps and the last request time for one session, in epoch ms.
 * Created with the session and discarded with it.
 */
export interface AttemptLedger {
  failures: number[];
  lastRequestAt: number;
}

export type GateReason = 'granted' | 'empty' | 'automation' | 'rate-limited' | 'no-match';

export interface GateDecision {
  /** `null` when the phrase was never inspected. */
  verdict: boolean | null;
  reason: GateReason;
  notice?: string;
}

export interface AccessGateOptions extends Partial<GateConfig> {
  now?: () => number;
}

export const GATE_NOTICES = {
  automation: 'Automation Detected. Slow down.',
  'rate-limited': 'System Locked. Too many attempts. Try again later.',
  'no-match': 'Access Denied.'
} as const;

export const VALID_FINGERPRINTS: ReadonlySet<string> = new Set([
  '1jan2026',
  '1jan26',
  'jan12026',
  'jan126',
  '01012026',
  '010126',
  '1126',
  '112026'
]);

const YEAR_TOKEN = '26';
const MONTH_TOKENS = ['jan', '01', '1'];
const STRIPPED_TOKENS = /st|nd|rd|th|\/|-|,|\s/g;

export function createAttemptLedger(): AttemptLedger {
  return { failures: [], lastRequestAt: 0 };
}

/** Drops ordinal suffixes, separators and whitespace from a lower-cased phrase. */
export function canonicalizeDatePhrase(phrase: string): string {
  return phrase.toLowerCase().trim().replace(STRIPPED_TOKENS, '');
}

/**
 * Matches a free-form date phrase against one fixed date. Only the spellings
 * in VALID_FINGERPRINTS pass; other encodings of the same day, such as ISO
 * dates, are rejected.
 */
export class AccessGate {
  private readonly minIntervalMs: number;
  private readonly windowMs: number;
  private readonly maxFailures: number;
  private readonly now: () => number;
  private readonly logger = getLogger();

  constructor(options: AccessGateOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? 500;
    this.windowMs = options.windowMs ?? 3_600_000;
    this.maxFailures = options.maxFailures ?? 10;
    this.now = options.now ?? (() => Date.now());
  }

  validate(candidate: string, ledger: AttemptLedger): boolean | null {
    return this.evaluate(candidate, ledger).verdict;
  }

  evaluate(candidate: string, ledger: AttemptLedger): GateDecision {
    if (!candidate) {
      return { verdict: null, reason: 'empty' };
    }

    const now = this.now();
    const elapsed = now - ledger.lastRequestAt;
    ledger.lastRequestAt = now;
    if (elapsed < this.minIntervalMs) {
      this.logger.info({ elapsedMs: elapsed }, 'Gate request rejected as automated');
      return { verdict: null, reason: 'automation', notice: GATE_NOTICES.automation };
    }

    ledger.failures = ledger.failures.filter((at) => now - at < this.windowMs);
    if (ledger.failures.length >= this.maxFailures) {
      this.logger.warn({ failures: ledger.failures.length }, 'Gate locked by failure limit');
      return { verdict: null, reason: 'rate-limited', notice: GATE_NOTICES['rate-limited'] };
    }

    const normalized = candidate.toLowerCase().trim();
    const hasYear = normalized.includes(YEAR_TOKEN);
    const hasMonth = MONTH_TOKENS.some((token) => normalized.includes(token));
    if (hasYear && hasMonth && VALID_FINGERPRINTS.has(canonicalizeDatePhrase(normalized))) {
      return { verdict: true, reason: 'granted' };
    }

    ledger.failures.push(now);
    this.logger.info({ failures: ledger.failures.length }, 'Gate phrase rejected');
    return { verdict: false, reason: 'no-match', notice: GATE_NOTICES['no-match'] };
  }
}
