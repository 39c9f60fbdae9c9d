/**
 * Business Rules Configuration
 *
 * Centralized limits for the ledger API. Values can be adjusted without
 * touching validation schemas or service logic.
 */

/**
 * Transaction payload limits
 */
export const LEDGER_LIMITS = {
  /** Free-text comment attached to transactions and owners */
  MAX_COMMENT_LENGTH: 1024,

  /** Portfolio and wallet display names */
  MAX_OWNER_NAME_LENGTH: 120,

  /** Market label of a portfolio (exchange or broker) */
  MAX_MARKET_LENGTH: 60,

  /** Digits before the point accepted in quantities and prices */
  MAX_INTEGER_DIGITS: 20,

  /**
   * Digits after the point: accepted in input, and kept in computed values
   * (trade value, transferred cost basis). Matches the NUMERIC scale of the schema.
   */
  LEDGER_SCALE: 18,

  /**
   * Significant digits kept by decimal.js. Every addend has at most
   * LEDGER_SCALE fractional digits and fewer than 41 integer digits, so sums
   * stay exact well past what the NUMERIC(60, 18) columns can hold.
   */
  DECIMAL_PRECISION: 100,
} as const;

/**
 * Pagination limits for transaction listings
 */
export const PAGINATION_LIMITS = {
  DEFAULT_PAGE_SIZE: 50,
  MAX_PAGE_SIZE: 200,
} as const;

/**
 * Rate Limiting Configuration
 *
 * - Global limits apply to all endpoints except /health
 * - Ledger mutations (create, update, delete, execute) get a stricter window
 */
export const RATE_LIMITS = {
  GLOBAL: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 100,
  },

  LEDGER_MUTATIONS: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 30,
  },
} as const;

/**
 * Database Query Configuration
 */
export const DB_QUERY_LIMITS = {
  /**
   * Global statement timeout (10 seconds).
   * The only deadline applied to a ledger unit of work.
   */
  STATEMENT_TIMEOUT_MS: 10_000,

  /** Queries slower than this are logged at warn level */
  SLOW_QUERY_THRESHOLD_MS: 1_000,
} as const;

export type LedgerLimits = typeof LEDGER_LIMITS;
export type PaginationLimits = typeof PAGINATION_LIMITS;
export type RateLimits = typeof RATE_LIMITS;
export type DBQueryLimits = typeof DB_QUERY_LIMITS;
