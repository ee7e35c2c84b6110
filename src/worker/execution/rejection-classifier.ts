/**
 * Splits venue failures into FATAL (stop and report) and TRANSIENT (retry).
 *
 * Anything unrecognized is TRANSIENT. Venues whose business rejections do not
 * map onto `ExchangeError` codes should extend `fatalCodes` / `fatalPatterns`
 * rather than change that default.
 */

import { ExchangeError, isNetworkError } from "@/adapters/errors";
import type { ExchangeErrorCode } from "@/adapters/errors";

export type RejectionClass = "FATAL" | "TRANSIENT";

export interface RejectionClassifier {
  classify: (error: unknown) => RejectionClass;
}

export interface RejectionClassifierConfig {
  fatalCodes: readonly ExchangeErrorCode[];
  /** Lowercase message fragments that mark an otherwise unclassified error as fatal */
  fatalPatterns: readonly string[];
}

export const DEFAULT_REJECTION_CLASSIFIER_CONFIG: RejectionClassifierConfig = {
  fatalCodes: ["INSUFFICIENT_FUNDS", "BAD_SYMBOL"],
  fatalPatterns: [
    "insufficient funds",
    "insufficient balance",
    "insufficient margin",
    "bad symbol",
    "unknown symbol",
    "invalid symbol",
  ],
};

const TRANSIENT_CODES: ReadonlySet<ExchangeErrorCode> = new Set(["RATE_LIMITED", "NETWORK_ERROR"]);

export const createRejectionClassifier = (
  config: Partial<RejectionClassifierConfig> = {},
): RejectionClassifier => {
  const fatalCodes = new Set(config.fatalCodes ?? DEFAULT_REJECTION_CLASSIFIER_CONFIG.fatalCodes);
  const fatalPatterns = config.fatalPatterns ?? DEFAULT_REJECTION_CLASSIFIER_CONFIG.fatalPatterns;

  const classify = (error: unknown): RejectionClass => {
    if (error instanceof ExchangeError) {
      if (fatalCodes.has(error.code)) {
        return "FATAL";
      }
      if (TRANSIENT_CODES.has(error.code)) {
        return "TRANSIENT";
      }
    }
    if (isNetworkError(error)) {
      return "TRANSIENT";
    }
    if (error instanceof Error) {
      const message = error.message.toLowerCase();
      if (fatalPatterns.some((pattern) => message.includes(pattern))) {
        return "FATAL";
      }
    }
    return "TRANSIENT";
  };

  return { classify };
};

export const defaultRejectionClassifier = createRejectionClassifier();
