import { describe, expect, it } from "vitest";
import { isValidTimeZone, parseDateTimeValue } from "./time.js";

describe("parseDateTimeValue", () => {
  it("reads epoch seconds as number and as digit string", () => {
    expect(parseDateTimeValue(1498429696)?.toISO()).toBe(
      "2017-06-25T22:28:16.000Z",
    );
    expect(parseDateTimeValue("1498429696")?.toISO()).toBe(
      "2017-06-25T22:28:16.000Z",
    );
  });

  it("reads ISO dates and SQL-style stamps in the given zone", () => {
    expect(parseDateTimeValue("2017-06-26")?.toFormat("yyyy-MM-dd")).toBe(
      "2017-06-26",
    );
    expect(
      parseDateTimeValue("2017-06-26 00:24:15")?.toFormat("HH:mm:ss"),
    ).toBe("00:24:15");
  });

  it("converts values with an offset into the zone", () => {
    expect(
      parseDateTimeValue("2017-06-26T02:00:00+02:00")?.toFormat("HH:mm"),
    ).toBe("00:00");
  });

  it("treats a four digit value as a year", () => {
    expect(parseDateTimeValue("2017")?.year).toBe(2017);
  });

  it("returns null for unreadable input", () => {
    expect(parseDateTimeValue("not a date")).toBeNull();
    expect(parseDateTimeValue("")).toBeNull();
    expect(parseDateTimeValue(undefined)).toBeNull();
  });

  it("validates zone names", () => {
    expect(isValidTimeZone("Europe/Amsterdam")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus")).toBe(false);
  });
});
