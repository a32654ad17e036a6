import type { Book, BorrowingRecord, NewBook, NewBorrowingRecord, NewUser, User } from "../types/library";

/**
 * Persistence port for the three library tables.
 *
 * Every method is synchronous and durable once it returns. Compound read-check-write sequences
 * must run inside `transaction`, which commits when `work` returns and discards every write made
 * by `work` when it throws.
 */
export interface LibraryStore {
  listUsers(): User[];
  listBooks(): Book[];
  listRecords(): BorrowingRecord[];
  findUser(id: number): User | null;
  findUserByUsername(username: string): User | null;
  findBook(id: number): Book | null;
  findRecord(id: number): BorrowingRecord | null;
  insertUser(draft: NewUser): User;
  upsertUser(user: User): void;
  insertBook(draft: NewBook): Book;
  upsertBook(book: Book): void;
  deleteBook(id: number): boolean;
  insertRecord(draft: NewBorrowingRecord): BorrowingRecord;
  upsertRecord(record: BorrowingRecord): void;
  transaction<T>(work: () => T): T;
  close(): void;
}
