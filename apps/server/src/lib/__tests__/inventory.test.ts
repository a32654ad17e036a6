import { describe, expect, it } from "vitest";
import type { Book } from "../../types/library";
import { adjustTotalCopies, borrowedCopies, decrementAvailable, incrementAvailable, reserveCopyCheck } from "../inventory";

const book = (totalCopies: number, availableCopies: number): Book => ({
  id: 7,
  title: "The Left Hand of Darkness",
  author: "Ursula K. Le Guin",
  isbn: "978-0-441-47812-5",
  publicationYear: 1969,
  totalCopies,
  availableCopies
});

describe("inventory ledger", () => {
  it("counts borrowed copies as total minus available", () => {
    expect(borrowedCopies(book(5, 2))).toBe(3);
  });

  it("rejects a copy check when nothing is on the shelf", () => {
    const result = reserveCopyCheck(book(2, 0));
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "OutOfStock",
        message: "No copies of this book are currently available",
        details: { bookId: 7 }
      }
    });
  });

  it("decrements available copies", () => {
    const result = decrementAvailable(book(2, 2));
    expect(result.ok && result.value.availableCopies).toBe(1);
  });

  it("refuses to decrement below zero", () => {
    const result = decrementAvailable(book(1, 0));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("OutOfStock");
    }
  });

  it("increments available copies up to the total", () => {
    const result = incrementAvailable(book(2, 1));
    expect(result.ok && result.value.availableCopies).toBe(2);
  });

  it("guards against returning more copies than exist", () => {
    const result = incrementAvailable(book(2, 2));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("Internal");
      expect(result.error.message).toBe("Available copies cannot exceed total copies");
    }
  });

  it("shifts available copies by the change in total", () => {
    const grown = adjustTotalCopies(book(3, 1), 5);
    expect(grown.ok && grown.value).toMatchObject({ totalCopies: 5, availableCopies: 3 });

    const shrunk = adjustTotalCopies(book(3, 1), 2);
    expect(shrunk.ok && shrunk.value).toMatchObject({ totalCopies: 2, availableCopies: 0 });
  });

  it("refuses to drop the total below the borrowed count", () => {
    const result = adjustTotalCopies(book(3, 1), 1);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "ValidationError",
        message: "Cannot reduce total copies below currently borrowed copies",
        details: { borrowedCopies: 2 }
      }
    });
  });
});
