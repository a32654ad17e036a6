import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createBorrowingService } from "../../lib/borrowing";
import type { LibraryStore } from "../store";
import { createSqliteStore } from "../sqlite-store";

const draftBook = {
  title: "A Wizard of Earthsea",
  author: "Ursula K. Le Guin",
  isbn: "978-0-553-38304-1",
  publicationYear: 1968,
  totalCopies: 2,
  availableCopies: 2
};

describe("sqlite store", () => {
  let store: LibraryStore;

  beforeEach(async () => {
    store = await createSqliteStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips users including an absent token", () => {
    const user = store.insertUser({ username: "alice", passwordHash: "salt:key", role: "student", token: null });

    expect(user.id).toBe(1);
    expect(store.findUser(1)).toEqual(user);
    expect(store.findUserByUsername("alice")).toEqual(user);
    expect(store.findUserByUsername("bob")).toBeNull();

    store.upsertUser({ ...user, token: "issued" });
    expect(store.findUser(1)?.token).toBe("issued");
  });

  it("maps book columns and keeps a null publication year", () => {
    const first = store.insertBook(draftBook);
    const second = store.insertBook({ ...draftBook, isbn: "other", publicationYear: null });

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(store.findBook(1)).toEqual({ id: 1, ...draftBook });
    expect(store.findBook(2)?.publicationYear).toBeNull();

    store.upsertBook({ ...first, availableCopies: 1 });
    expect(store.findBook(1)?.availableCopies).toBe(1);

    expect(store.deleteBook(2)).toBe(true);
    expect(store.deleteBook(2)).toBe(false);
    expect(store.listBooks().map((book) => book.id)).toEqual([1]);
  });

  it("refuses more available copies than the total", () => {
    const book = store.insertBook(draftBook);
    expect(() => store.upsertBook({ ...book, availableCopies: 3 })).toThrow();
  });

  it("round-trips borrowing records", () => {
    const record = store.insertRecord({
      studentId: 1,
      bookId: 1,
      borrowDate: null,
      dueDate: null,
      returnDate: null,
      closedAt: null,
      status: "reserved"
    });

    expect(store.findRecord(record.id)).toEqual(record);

    store.upsertRecord({ ...record, status: "cancelled", closedAt: "2024-01-02T00:00:00.000Z" });
    expect(store.listRecords()).toEqual([
      { ...record, status: "cancelled", closedAt: "2024-01-02T00:00:00.000Z" }
    ]);
  });

  it("rolls back a transaction that throws", () => {
    expect(() =>
      store.transaction(() => {
        store.insertBook(draftBook);
        throw new Error("abort");
      })
    ).toThrow("abort");

    expect(store.listBooks()).toEqual([]);
  });

  it("backs the borrowing lifecycle", () => {
    const student = store.insertUser({ username: "alice", passwordHash: "salt:key", role: "student", token: null });
    const book = store.insertBook(draftBook);
    const service = createBorrowingService(store, { now: () => new Date("2024-01-01T10:00:00.000Z") });

    const reservation = service.reserve(student.id, book.id);
    const loan = service.borrow(student.id, book.id);

    expect(reservation.ok && loan.ok && loan.value.record.id === reservation.value.id).toBe(true);
    expect(store.findRecord(1)).toMatchObject({ status: "borrowed", dueDate: "2024-01-29T23:59:59.999Z" });
    expect(store.findBook(book.id)?.availableCopies).toBe(1);
  });

  it("never hands a deleted book's id to a new book", () => {
    const retired = store.insertBook(draftBook);
    store.insertRecord({
      studentId: 1,
      bookId: retired.id,
      borrowDate: "2024-01-01T10:00:00.000Z",
      dueDate: "2024-01-29T23:59:59.999Z",
      returnDate: "2024-01-02T10:00:00.000Z",
      closedAt: "2024-01-02T10:00:00.000Z",
      status: "returned"
    });
    store.deleteBook(retired.id);

    const replacement = store.insertBook({ ...draftBook, isbn: "978-0-553-38305-8" });

    expect(replacement.id).toBe(2);
    expect(store.findBook(retired.id)).toBeNull();
    expect(store.listRecords().filter((record) => record.bookId === replacement.id)).toEqual([]);
  });
});

describe("sqlite store on disk", () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "library-records-"));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it("reloads committed rows and keeps ids retired after a reopen", async () => {
    const filename = path.join(directory, "nested", "library.db");
    const first = await createSqliteStore(filename);
    const book = first.insertBook(draftBook);
    first.deleteBook(book.id);
    first.insertBook({ ...draftBook, isbn: "kept" });
    first.close();

    const second = await createSqliteStore(filename);
    expect(second.listBooks().map((entry) => [entry.id, entry.isbn])).toEqual([[2, "kept"]]);
    expect(second.insertBook({ ...draftBook, isbn: "later" }).id).toBe(3);
    second.close();
  });

  it("does not write rolled-back work to the file", async () => {
    const filename = path.join(directory, "library.db");
    const first = await createSqliteStore(filename);
    expect(() =>
      first.transaction(() => {
        first.insertBook(draftBook);
        throw new Error("abort");
      })
    ).toThrow("abort");
    first.close();

    const second = await createSqliteStore(filename);
    expect(second.listBooks()).toEqual([]);
    second.close();
  });
});
