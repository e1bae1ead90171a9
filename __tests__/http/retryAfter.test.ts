import { describe, it, expect } from "vitest";
import { parseHttpDate, parseRetryAfter } from "../../src/http/retryAfter.js";

const NOW = Date.UTC(1994, 10, 6, 8, 49, 7);
const now = () => NOW;

describe("parseRetryAfter", () => {
  it("reads delta-seconds as written", () => {
    expect(parseRetryAfter("120", now)).toBe(120);
    expect(parseRetryAfter(" 1.5 ", now)).toBe(1.5);
    expect(parseRetryAfter("0", now)).toBe(0);
  });

  it("does not clamp negative delta-seconds", () => {
    expect(parseRetryAfter("-3", now)).toBe(-3);
  });

  it("returns undefined when there is no usable hint", () => {
    expect(parseRetryAfter(null, now)).toBeUndefined();
    expect(parseRetryAfter(undefined, now)).toBeUndefined();
    expect(parseRetryAfter("   ", now)).toBeUndefined();
    expect(parseRetryAfter("soon", now)).toBeUndefined();
  });

  it("turns an IMF-fixdate into seconds from now", () => {
    expect(parseRetryAfter("Sun, 06 Nov 1994 08:49:37 GMT", now)).toBe(30);
  });

  it("accepts the RFC 850 and asctime forms", () => {
    expect(parseRetryAfter("Sunday, 06-Nov-94 08:49:37 GMT", now)).toBe(30);
    expect(parseRetryAfter("Sun Nov  6 08:49:37 1994", now)).toBe(30);
  });

  it("applies numeric zone offsets", () => {
    expect(parseRetryAfter("Sun, 06 Nov 1994 09:49:37 +0100", now)).toBe(30);
  });

  it("floors dates in the past at zero", () => {
    expect(parseRetryAfter("Sun, 06 Nov 1994 08:00:00 GMT", now)).toBe(0);
  });
});

describe("parseHttpDate", () => {
  it("returns epoch milliseconds", () => {
    expect(parseHttpDate("Sun, 06 Nov 1994 08:49:37 GMT")).toBe(Date.UTC(1994, 10, 6, 8, 49, 37));
  });

  it("treats a date without zone as UTC", () => {
    expect(parseHttpDate("06 Nov 1994 08:49:37")).toBe(Date.UTC(1994, 10, 6, 8, 49, 37));
  });

  it("rejects unknown months and out-of-range fields", () => {
    expect(parseHttpDate("Sun, 06 Foo 1994 08:49:37 GMT")).toBeUndefined();
    expect(parseHttpDate("Sun, 06 Nov 1994 25:49:37 GMT")).toBeUndefined();
    expect(parseHttpDate("Sun, 06 Nov 1994 08:49:37 XYZ")).toBeUndefined();
  });

  it("rejects a day the month does not have", () => {
    expect(parseHttpDate("Thu, 31 Feb 2030 00:00:00 GMT")).toBeUndefined();
    expect(parseHttpDate("Wed, 31 Apr 2030 00:00:00 GMT")).toBeUndefined();
    expect(parseHttpDate("Thu, 29 Feb 2024 00:00:00 GMT")).toBe(Date.UTC(2024, 1, 29));
    expect(parseRetryAfter("Thu, 31 Feb 2030 00:00:00 GMT", now)).toBeUndefined();
  });
});
