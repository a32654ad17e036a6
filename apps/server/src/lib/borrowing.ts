import type { LibraryStore } from "../db/store";
import { isActiveRecord, type Book, type BorrowingRecord, type User } from "../types/library";
import { computeDueDate } from "./due-date";
import { failure, messages, type LibraryFailure } from "./failures";
import { decrementAvailable, incrementAvailable } from "./inventory";
import { ok, type Result } from "./result";

export type BorrowingPolicy = {
  maxBorrowedBooks: number;
  loanWeeks: number;
  now: () => Date;
};

export type BorrowOutcome = {
  record: BorrowingRecord;
  book: Book;
  collectedReservation: boolean;
};

export type ActiveRecordWithBook = {
  record: BorrowingRecord;
  book: Book;
};

export type ActiveRecordWithDetails = ActiveRecordWithBook & {
  student: User;
};

export const defaultBorrowingPolicy: BorrowingPolicy = {
  maxBorrowedBooks: 3,
  loanWeeks: 4,
  now: () => new Date()
};

const findActiveRecord = (store: LibraryStore, studentId: number, bookId: number): BorrowingRecord | null =>
  store
    .listRecords()
    .find((record) => record.studentId === studentId && record.bookId === bookId && isActiveRecord(record)) ?? null;

const countBorrowed = (store: LibraryStore, studentId: number): number =>
  store.listRecords().filter((record) => record.studentId === studentId && record.status === "borrowed").length;

/**
 * Reservation and loan lifecycle: none -> reserved -> borrowed -> returned, with
 * reserved -> cancelled and none -> borrowed as alternate paths.
 *
 * Each operation runs as one store transaction so copy counts and record status change together.
 */
export const createBorrowingService = (store: LibraryStore, overrides: Partial<BorrowingPolicy> = {}) => {
  const policy: BorrowingPolicy = { ...defaultBorrowingPolicy, ...overrides };

  const borrow = (studentId: number, bookId: number): Result<BorrowOutcome, LibraryFailure> =>
    store.transaction(() => {
      const book = store.findBook(bookId);
      if (!book) {
        return failure("NotFound", messages.bookNotFound, { bookId });
      }

      const atLimit = countBorrowed(store, studentId) >= policy.maxBorrowedBooks;
      const limitReached = () =>
        failure("LimitExceeded", messages.limitReached(policy.maxBorrowedBooks), { limit: policy.maxBorrowedBooks });

      // Re-borrowing a held book reports the limit before the duplicate; stock is not consulted.
      const existing = findActiveRecord(store, studentId, bookId);
      if (existing?.status === "borrowed") {
        return atLimit ? limitReached() : failure("Conflict", messages.alreadyBorrowed, { recordId: existing.id });
      }

      const decremented = decrementAvailable(book);
      if (!decremented.ok) {
        return decremented;
      }

      if (atLimit) {
        return limitReached();
      }

      const borrowedAt = policy.now();
      const loanDates = {
        borrowDate: borrowedAt.toISOString(),
        dueDate: computeDueDate(borrowedAt, policy.loanWeeks).toISOString()
      };

      store.upsertBook(decremented.value);

      if (existing) {
        // Collecting a reservation keeps the reservation's id.
        const record: BorrowingRecord = { ...existing, ...loanDates, status: "borrowed" };
        store.upsertRecord(record);
        return ok({ record, book: decremented.value, collectedReservation: true });
      }

      const record = store.insertRecord({
        studentId,
        bookId,
        ...loanDates,
        returnDate: null,
        closedAt: null,
        status: "borrowed"
      });
      return ok({ record, book: decremented.value, collectedReservation: false });
    });

  // Reservations do not hold a copy; availability only moves when the book is collected.
  const reserve = (studentId: number, bookId: number): Result<BorrowingRecord, LibraryFailure> =>
    store.transaction(() => {
      if (!store.findBook(bookId)) {
        return failure("NotFound", messages.bookNotFound, { bookId });
      }

      const existing = findActiveRecord(store, studentId, bookId);
      if (existing) {
        return failure("Conflict", messages.alreadyBorrowedOrReserved, {
          recordId: existing.id,
          status: existing.status
        });
      }

      return ok(
        store.insertRecord({
          studentId,
          bookId,
          borrowDate: null,
          dueDate: null,
          returnDate: null,
          closedAt: null,
          status: "reserved"
        })
      );
    });

  const cancelReservation = (studentId: number, recordId: number): Result<BorrowingRecord, LibraryFailure> =>
    store.transaction(() => {
      const record = store.findRecord(recordId);
      if (!record || record.studentId !== studentId) {
        return failure("NotFound", messages.reservationNotFound, { recordId });
      }
      if (record.status !== "reserved") {
        return failure("InvalidState", messages.onlyReservedCancellable, { status: record.status });
      }

      const closedAt = policy.now().toISOString();
      const cancelled: BorrowingRecord = { ...record, status: "cancelled", returnDate: closedAt, closedAt };
      store.upsertRecord(cancelled);
      return ok(cancelled);
    });

  const returnRecord = (recordId: number): Result<ActiveRecordWithBook, LibraryFailure> =>
    store.transaction(() => {
      const record = store.findRecord(recordId);
      if (!record) {
        return failure("NotFound", messages.recordNotFound, { recordId });
      }
      if (!isActiveRecord(record)) {
        return failure("InvalidState", messages.notBorrowedOrReserved, { status: record.status });
      }

      const book = store.findBook(record.bookId);
      if (!book) {
        return failure("Internal", messages.associatedBookMissing, { recordId, bookId: record.bookId });
      }

      let updatedBook = book;
      // A pure reservation never took a copy, so there is nothing to put back.
      if (record.borrowDate) {
        const incremented = incrementAvailable(book);
        if (!incremented.ok) {
          return incremented;
        }
        updatedBook = incremented.value;
        store.upsertBook(updatedBook);
      }

      const closedAt = policy.now().toISOString();
      const returned: BorrowingRecord = { ...record, status: "returned", returnDate: closedAt, closedAt };
      store.upsertRecord(returned);
      return ok({ record: returned, book: updatedBook });
    });

  const deleteBook = (bookId: number): Result<Book, LibraryFailure> =>
    store.transaction(() => {
      const book = store.findBook(bookId);
      if (!book) {
        return failure("NotFound", messages.bookNotFound, { bookId });
      }

      const blocking = store.listRecords().filter((record) => record.bookId === bookId && isActiveRecord(record));
      if (blocking.length > 0) {
        return failure("Conflict", messages.activeRecordsBlockDelete, {
          recordIds: blocking.map((record) => record.id)
        });
      }

      store.deleteBook(bookId);
      return ok(book);
    });

  const listActiveForStudent = (studentId: number): ActiveRecordWithBook[] => {
    const books = new Map(store.listBooks().map((book) => [book.id, book]));
    return store
      .listRecords()
      .filter((record) => record.studentId === studentId && isActiveRecord(record))
      .flatMap((record) => {
        const book = books.get(record.bookId);
        return book ? [{ record, book }] : [];
      });
  };

  const listActive = (): ActiveRecordWithDetails[] => {
    const books = new Map(store.listBooks().map((book) => [book.id, book]));
    const users = new Map(store.listUsers().map((user) => [user.id, user]));
    return store
      .listRecords()
      .filter(isActiveRecord)
      .flatMap((record) => {
        const book = books.get(record.bookId);
        const student = users.get(record.studentId);
        return book && student ? [{ record, book, student }] : [];
      });
  };

  return {
    borrow,
    reserve,
    cancelReservation,
    returnRecord,
    deleteBook,
    listActiveForStudent,
    listActive
  };
};

export type BorrowingService = ReturnType<typeof createBorrowingService>;
