import { describe, it, expect } from "vitest";
import { CalendarDate } from "./calendar-date.js";

describe("CalendarDate", () => {
  it("parses and prints YYYY-MM-DD", () => {
    const date = CalendarDate.parse("2024-03-09");
    expect(date.year).toBe(2024);
    expect(date.month).toBe(3);
    expect(date.day).toBe(9);
    expect(date.toString()).toBe("2024-03-09");
  });

  it("zero-pads small years", () => {
    expect(CalendarDate.of(987, 1, 1).toString()).toBe("0987-01-01");
  });

  it("rejects dates that do not exist", () => {
    expect(() => CalendarDate.of(2023, 2, 29)).toThrow(RangeError);
    expect(() => CalendarDate.parse("2024-13-01")).toThrow(RangeError);
    expect(() => CalendarDate.parse("2024-1-01")).toThrow("Invalid calendar date: 2024-1-01");
  });

  it("accepts leap days", () => {
    expect(CalendarDate.isValid("2024-02-29")).toBe(true);
    expect(CalendarDate.isValid("2100-02-29")).toBe(false);
  });

  it("compares by value", () => {
    expect(CalendarDate.parse("2024-05-01").equals(CalendarDate.of(2024, 5, 1))).toBe(true);
    expect(CalendarDate.parse("2024-05-01").equals(CalendarDate.of(2024, 5, 2))).toBe(false);
  });
});
