import { describe, expect, it } from "vitest";
import { computeDueDate, isWorkingDay } from "../due-date";

describe("isWorkingDay", () => {
  it("treats Monday to Friday as working days", () => {
    expect(isWorkingDay(new Date("2024-01-08T12:00:00.000Z"))).toBe(true);
    expect(isWorkingDay(new Date("2024-01-12T12:00:00.000Z"))).toBe(true);
  });

  it("skips weekends", () => {
    expect(isWorkingDay(new Date("2024-01-06T12:00:00.000Z"))).toBe(false);
    expect(isWorkingDay(new Date("2024-01-07T12:00:00.000Z"))).toBe(false);
  });
});

describe("computeDueDate", () => {
  it("lands 20 weekdays after a Monday borrow", () => {
    const due = computeDueDate(new Date("2024-01-01T10:00:00.000Z"));
    expect(due.toISOString()).toBe("2024-01-29T23:59:59.999Z");

    let weekdays = 0;
    for (let day = new Date("2024-01-02T00:00:00.000Z"); day <= due; day.setUTCDate(day.getUTCDate() + 1)) {
      if (isWorkingDay(day)) {
        weekdays += 1;
      }
    }
    expect(weekdays).toBe(20);
  });

  it("starts counting on the following Monday for a Saturday borrow", () => {
    const due = computeDueDate(new Date("2024-01-06T09:00:00.000Z"));
    expect(due.toISOString()).toBe("2024-02-02T23:59:59.999Z");
  });

  it("honours a shorter loan length", () => {
    const due = computeDueDate(new Date("2024-01-05T16:30:00.000Z"), 1);
    expect(due.toISOString()).toBe("2024-01-12T23:59:59.999Z");
  });

  it("returns the next day when no working weeks are requested", () => {
    const due = computeDueDate(new Date("2024-01-01T10:00:00.000Z"), 0);
    expect(due.toISOString()).toBe("2024-01-02T23:59:59.999Z");
  });

  it("leaves the borrow date untouched", () => {
    const borrowedAt = new Date("2024-01-01T10:00:00.000Z");
    computeDueDate(borrowedAt);
    expect(borrowedAt.toISOString()).toBe("2024-01-01T10:00:00.000Z");
  });
});
