import { expect } from "vitest";
import type { LibraryStore } from "../../db/store";
import type { Book, User } from "../../types/library";
import type { LibraryFailure } from "../failures";
import type { Result } from "../result";

export const fixedNow = () => new Date("2024-01-01T10:00:00.000Z");

export const student = (id: number, username: string): User => ({
  id,
  username,
  passwordHash: "not-a-real-hash",
  role: "student",
  token: null
});

export const librarian = (id: number, username: string): User => ({
  id,
  username,
  passwordHash: "not-a-real-hash",
  role: "librarian",
  token: null
});

export const book = (id: number, totalCopies: number, availableCopies = totalCopies): Book => ({
  id,
  title: `Book ${id}`,
  author: `Author ${id}`,
  isbn: `isbn-${id}`,
  publicationYear: 2000 + id,
  totalCopies,
  availableCopies
});

export const expectOk = <T>(result: Result<T, LibraryFailure>): T => {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
};

export const expectFailure = <T>(result: Result<T, LibraryFailure>): LibraryFailure => {
  if (result.ok) {
    throw new Error("expected a failure");
  }
  return result.error;
};

/** available = total - borrowed for every book, and nobody holds more than `limit` loans. */
export const expectLedgerConsistent = (store: LibraryStore, limit = 3) => {
  const records = store.listRecords();
  for (const entry of store.listBooks()) {
    const borrowed = records.filter((record) => record.bookId === entry.id && record.status === "borrowed").length;
    expect(entry.availableCopies).toBe(entry.totalCopies - borrowed);
  }
  for (const user of store.listUsers()) {
    const loans = records.filter((record) => record.studentId === user.id && record.status === "borrowed").length;
    expect(loans).toBeLessThanOrEqual(limit);
  }
};
