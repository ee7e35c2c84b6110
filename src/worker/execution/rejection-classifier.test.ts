import { describe, expect, it } from "vitest";

import { ExchangeError } from "@/adapters/errors";

import { createRejectionClassifier, defaultRejectionClassifier } from "./rejection-classifier";

describe("defaultRejectionClassifier", () => {
  const { classify } = defaultRejectionClassifier;

  it("should treat insufficient funds as fatal", () => {
    expect(classify(new ExchangeError("no funds", "INSUFFICIENT_FUNDS", "paper"))).toBe("FATAL");
  });

  it("should treat unknown symbols as fatal", () => {
    expect(classify(new ExchangeError("no such market", "BAD_SYMBOL", "paper"))).toBe("FATAL");
  });

  it("should treat rate limits and network errors as transient", () => {
    expect(classify(new ExchangeError("slow down", "RATE_LIMITED", "paper"))).toBe("TRANSIENT");
    expect(classify(new ExchangeError("reset", "NETWORK_ERROR", "paper"))).toBe("TRANSIENT");
    expect(classify(Object.assign(new Error("socket"), { code: "ETIMEDOUT" }))).toBe("TRANSIENT");
  });

  it("should recognize fatal rejections by message", () => {
    expect(classify(new Error("Account has Insufficient Balance for order"))).toBe("FATAL");
    expect(classify(new ExchangeError("Unknown symbol FOO/BAR", "UNKNOWN", "paper"))).toBe(
      "FATAL",
    );
  });

  it("should default unknown errors to transient", () => {
    expect(classify(new Error("something odd"))).toBe("TRANSIENT");
    expect(classify("not even an error")).toBe("TRANSIENT");
    expect(classify(new ExchangeError("order invalid", "INVALID_ORDER", "paper"))).toBe(
      "TRANSIENT",
    );
  });
});

describe("createRejectionClassifier", () => {
  it("should accept extra fatal codes", () => {
    const classifier = createRejectionClassifier({
      fatalCodes: ["INSUFFICIENT_FUNDS", "BAD_SYMBOL", "INVALID_ORDER"],
    });

    expect(classifier.classify(new ExchangeError("bad size", "INVALID_ORDER", "paper"))).toBe(
      "FATAL",
    );
  });

  it("should accept venue-specific message patterns", () => {
    const classifier = createRejectionClassifier({ fatalPatterns: ["reduce-only"] });

    expect(classifier.classify(new Error("Reduce-only order would increase position"))).toBe(
      "FATAL",
    );
    expect(classifier.classify(new Error("insufficient funds"))).toBe("TRANSIENT");
  });
});
