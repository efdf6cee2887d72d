/**
 * Configuration validation error (with missing field list).
 * Thrown by createBotNannyConfig once every problem has been collected.
 */
export type ConfigValidationError = Error & {
  readonly name: 'ConfigValidationError';
  readonly missingFields: ReadonlyArray<string>;
};

/**
 * Parameters of a numeric setting with bounds.
 * `integer` rejects fractional input.
 */
export type BoundedNumberConfig = {
  readonly envKey: string;
  readonly defaultValue: number;
  readonly min: number;
  readonly max: number;
  readonly integer?: boolean;
};

/**
 * Result of parsing a comma-separated id list.
 * `invalid` keeps the raw tokens that are not positive integers.
 */
export type IdListParseResult = {
  readonly ids: ReadonlyArray<number>;
  readonly invalid: ReadonlyArray<string>;
};

/**
 * Result of parsing STOP_LOSS_RULES (`min:sl,min:sl`).
 */
export type RulesParseResult = {
  readonly rules: ReadonlyArray<{ readonly minPnlPercent: number; readonly newStopLossPercent: number }>;
  readonly invalid: ReadonlyArray<string>;
};

/**
 * Accumulates problems while the configuration is read.
 * Only used inside the config module.
 */
export type ConfigIssues = {
  readonly errors: string[];
  readonly missingFields: string[];
};

/**
 * Generic validation result.
 */
export type ValidationResult = {
  readonly valid: boolean;
  readonly errors: ReadonlyArray<string>;
};
