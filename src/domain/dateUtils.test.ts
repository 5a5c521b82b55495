// src/domain/dateUtils.test.ts
import {
  INVALID_DATE,
  addDays,
  addMonths,
  addPeriod,
  addYears,
  dateDifference,
  dayOfWeek,
  endOfMonth,
  fromSerialDays,
  fromUTCDate,
  isEndOfMonth,
  isISODate,
  isLeapYear,
  isValidDate,
  makeDate,
  parseISODate,
  startOfMonth,
  toISODate,
  toSerialDays,
  toUTCDate,
} from "./dateUtils";
import { InvalidDateError } from "./errors";
import { REFERENCE_YEAR_DAYS } from "./constants";
import { months, weeks, years } from "./periods";

describe("dateUtils - construction", () => {
  test("makeDate accepts valid fields", () => {
    const d = makeDate(2024, 2, 29);
    expect(d.year).toBe(2024);
    expect(d.month).toBe(2);
    expect(d.day).toBe(29);
  });

  test("makeDate rejects out-of-range fields instead of clamping", () => {
    expect(() => makeDate(2023, 2, 30)).toThrow(InvalidDateError);
    expect(() => makeDate(2023, 4, 31)).toThrow(InvalidDateError);
    expect(() => makeDate(2023, 13, 1)).toThrow(InvalidDateError);
    expect(() => makeDate(2023, 0, 1)).toThrow(InvalidDateError);
    expect(() => makeDate(2023, 1, 0)).toThrow(InvalidDateError);
    expect(() => makeDate(2023, 1, 1.5)).toThrow(InvalidDateError);
  });

  test("leap years follow the Gregorian rule", () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2023)).toBe(false);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
    expect(() => makeDate(1900, 2, 29)).toThrow(InvalidDateError);
    expect(makeDate(2000, 2, 29).day).toBe(29);
  });

  test("the invalid sentinel never validates and poisons arithmetic", () => {
    expect(isValidDate(INVALID_DATE)).toBe(false);
    expect(addDays(INVALID_DATE, 1)).toBe(INVALID_DATE);
    expect(addMonths(INVALID_DATE, 1)).toBe(INVALID_DATE);
    expect(addYears(INVALID_DATE, 1)).toBe(INVALID_DATE);
    expect(dateDifference(INVALID_DATE, makeDate(2023, 1, 1))).toBeNaN();
  });

  test("addYears rejects a non-finite year count", () => {
    const d = makeDate(2024, 1, 1);
    expect(() => addYears(d, Number.NaN)).toThrow(InvalidDateError);
    expect(() => addYears(d, Number.POSITIVE_INFINITY)).toThrow("years must be finite");
    expect(() => addYears(d, Number.NEGATIVE_INFINITY)).toThrow(InvalidDateError);
  });

  test("makeDate reports the rejected fields", () => {
    try {
      makeDate(2023, 2, 30);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidDateError);
      if (err instanceof InvalidDateError) {
        expect(err.input).toBe("2023-2-30");
        expect([err.year, err.month, err.day]).toEqual([2023, 2, 30]);
      }
    }
    try {
      parseISODate("yesterday");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidDateError);
      if (err instanceof InvalidDateError) {
        expect(err.year).toBeUndefined();
      }
    }
  });
});

describe("dateUtils - serial days", () => {
  test("serial 0 is 1970-01-01", () => {
    expect(toSerialDays(makeDate(1970, 1, 1))).toBe(0);
    expect(toSerialDays(makeDate(1970, 1, 2))).toBe(1);
    expect(toSerialDays(makeDate(1969, 12, 31))).toBe(-1);
    expect(toSerialDays(makeDate(2000, 1, 1))).toBe(10957);
    expect(toSerialDays(makeDate(2000, 3, 1))).toBe(11017);
  });

  test("fromSerialDays inverts toSerialDays", () => {
    const d = fromSerialDays(10957);
    expect(toISODate(d)).toBe("2000-01-01");
    expect(toISODate(fromSerialDays(-719468))).toBe("0000-03-01");
  });

  test("round-trips across a wide range of serials", () => {
    for (let serial = -800_000; serial <= 800_000; serial += 997) {
      const d = fromSerialDays(serial);
      expect(isValidDate(d)).toBe(true);
      expect(makeDate(d.year, d.month, d.day).serial).toBe(serial);
    }
  });

  test("round-trips every day of a leap year", () => {
    let d = makeDate(2024, 1, 1);
    for (let i = 0; i < 366; i++) {
      expect(fromSerialDays(toSerialDays(d))).toEqual(d);
      d = addDays(d, 1);
    }
    expect(toISODate(d)).toBe("2025-01-01");
  });

  test("fromSerialDays rejects non-integers", () => {
    expect(() => fromSerialDays(1.5)).toThrow(InvalidDateError);
  });
});

describe("dateUtils - differences", () => {
  const d0 = makeDate(2023, 4, 5);
  const d1 = makeDate(2024, 4, 5);

  test("one day is 1 / REFERENCE_YEAR_DAYS years", () => {
    expect(dateDifference(makeDate(2023, 1, 2), makeDate(2023, 1, 1))).toBe(
      1 / REFERENCE_YEAR_DAYS
    );
  });

  test("dateDifference is antisymmetric", () => {
    expect(dateDifference(d0, d1)).toBe(-dateDifference(d1, d0));
    expect(dateDifference(d0, d0)).toBe(0);
  });

  test("addYears inverts dateDifference", () => {
    const dt = dateDifference(d0, d1);
    expect(addYears(d1, dt)).toEqual(d0);
    expect(addYears(d0, -dt)).toEqual(d1);
  });

  test("addYears inverts dateDifference over long spans", () => {
    const a = makeDate(1901, 7, 13);
    const b = makeDate(2099, 2, 27);
    const dt = dateDifference(b, a);
    expect(addYears(a, dt)).toEqual(b);
    expect(addYears(b, -dt)).toEqual(a);
  });
});

describe("dateUtils - calendar arithmetic", () => {
  test("addDays moves date forward correctly", () => {
    expect(toISODate(addDays(makeDate(2025, 1, 31), 1))).toBe("2025-02-01");
    expect(toISODate(addDays(makeDate(2025, 1, 1), -1))).toBe("2024-12-31");
  });

  test("addMonths clamps to the end of the month", () => {
    expect(toISODate(addMonths(makeDate(2023, 1, 31), 1))).toBe("2023-02-28");
    expect(toISODate(addMonths(makeDate(2024, 1, 31), 1))).toBe("2024-02-29");
    expect(toISODate(addMonths(makeDate(2023, 3, 31), -1))).toBe("2023-02-28");
    expect(toISODate(addMonths(makeDate(2023, 5, 31), 1))).toBe("2023-06-30");
  });

  test("addMonths carries across years", () => {
    expect(toISODate(addMonths(makeDate(2023, 12, 15), 1))).toBe("2024-01-15");
    expect(toISODate(addMonths(makeDate(2024, 1, 15), -13))).toBe("2022-12-15");
  });

  test("addPeriod dispatches on the unit", () => {
    const d = makeDate(2023, 1, 2);
    expect(toISODate(addPeriod(d, weeks(2)))).toBe("2023-01-16");
    expect(toISODate(addPeriod(d, months(6)))).toBe("2023-07-02");
    expect(toISODate(addPeriod(makeDate(2024, 2, 29), years(1)))).toBe("2025-02-28");
  });

  test("startOfMonth and endOfMonth are correct for typical month", () => {
    const d = makeDate(2025, 7, 15);
    expect(toISODate(startOfMonth(d))).toBe("2025-07-01");
    expect(toISODate(endOfMonth(d))).toBe("2025-07-31");
  });

  test("endOfMonth handles February and leap years", () => {
    expect(toISODate(endOfMonth(makeDate(2024, 2, 10)))).toBe("2024-02-29");
    expect(toISODate(endOfMonth(makeDate(2025, 2, 10)))).toBe("2025-02-28");
    expect(isEndOfMonth(makeDate(2024, 2, 29))).toBe(true);
    expect(isEndOfMonth(makeDate(2025, 2, 27))).toBe(false);
  });

  test("dayOfWeek uses 0 = Sunday", () => {
    expect(dayOfWeek(makeDate(1970, 1, 1))).toBe(4);
    expect(dayOfWeek(makeDate(2023, 1, 1))).toBe(0);
    expect(dayOfWeek(makeDate(2024, 3, 9))).toBe(6);
    expect(dayOfWeek(makeDate(1969, 12, 29))).toBe(1);
  });
});

describe("dateUtils - ISO and Date interop", () => {
  test("toISODate pads every field", () => {
    expect(toISODate(makeDate(5, 3, 7))).toBe("0005-03-07");
  });

  test("parseISODate reads YYYY-MM-DD", () => {
    const d = parseISODate("2030-12-25");
    expect(d).toEqual(makeDate(2030, 12, 25));
  });

  test("parseISODate rejects malformed or impossible dates", () => {
    expect(() => parseISODate("2023-02-30")).toThrow(InvalidDateError);
    expect(() => parseISODate("2023-2-3")).toThrow(InvalidDateError);
    expect(() => parseISODate("yesterday")).toThrow(InvalidDateError);
    expect(isISODate("2023-02-28")).toBe(true);
    expect(isISODate("2023-02-29")).toBe(false);
  });

  test("fromUTCDate and toUTCDate agree with Date.UTC", () => {
    expect(fromUTCDate(new Date(Date.UTC(2025, 0, 5)))).toEqual(makeDate(2025, 1, 5));
    expect(toUTCDate(makeDate(2025, 1, 5)).getTime()).toBe(Date.UTC(2025, 0, 5));
    expect(() => fromUTCDate(new Date(Number.NaN))).toThrow(InvalidDateError);
  });
});
