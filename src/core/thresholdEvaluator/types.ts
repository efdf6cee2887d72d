/**
 * Evaluation options
 */
export type EvaluateOptions = {
  /** Decimal places both sides are rounded to before comparing */
  readonly pnlPrecision: number;
};
