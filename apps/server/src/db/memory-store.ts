import type { Book, BorrowingRecord, User } from "../types/library";
import type { LibraryStore } from "./store";

type Sequences = {
  users: number;
  books: number;
  records: number;
};

type Tables = {
  users: Map<number, User>;
  books: Map<number, Book>;
  records: Map<number, BorrowingRecord>;
  // Highest id ever handed out per table. Deleting a row never lowers it.
  sequences: Sequences;
};

const highestId = (rows: { id: number }[]): number => rows.reduce((max, row) => Math.max(max, row.id), 0);

const cloneTables = (tables: Tables): Tables => ({
  users: new Map([...tables.users].map(([id, user]) => [id, { ...user }])),
  books: new Map([...tables.books].map(([id, book]) => [id, { ...book }])),
  records: new Map([...tables.records].map(([id, record]) => [id, { ...record }])),
  sequences: { ...tables.sequences }
});

const byId = <T extends { id: number }>(a: T, b: T): number => a.id - b.id;

export type MemoryStoreSeed = {
  users?: User[];
  books?: Book[];
  records?: BorrowingRecord[];
};

/** Process-local store used by tests and throwaway runs. Rows are copied on the way in and out. */
export const createMemoryStore = (seed: MemoryStoreSeed = {}): LibraryStore => {
  let tables: Tables = {
    users: new Map((seed.users ?? []).map((user) => [user.id, { ...user }])),
    books: new Map((seed.books ?? []).map((book) => [book.id, { ...book }])),
    records: new Map((seed.records ?? []).map((record) => [record.id, { ...record }])),
    sequences: {
      users: highestId(seed.users ?? []),
      books: highestId(seed.books ?? []),
      records: highestId(seed.records ?? [])
    }
  };
  let depth = 0;

  return {
    listUsers: () => [...tables.users.values()].map((user) => ({ ...user })).sort(byId),
    listBooks: () => [...tables.books.values()].map((book) => ({ ...book })).sort(byId),
    listRecords: () => [...tables.records.values()].map((record) => ({ ...record })).sort(byId),

    findUser(id) {
      const user = tables.users.get(id);
      return user ? { ...user } : null;
    },

    findUserByUsername(username) {
      for (const user of tables.users.values()) {
        if (user.username === username) {
          return { ...user };
        }
      }
      return null;
    },

    findBook(id) {
      const book = tables.books.get(id);
      return book ? { ...book } : null;
    },

    findRecord(id) {
      const record = tables.records.get(id);
      return record ? { ...record } : null;
    },

    insertUser(draft) {
      tables.sequences.users += 1;
      const user: User = { id: tables.sequences.users, ...draft };
      tables.users.set(user.id, { ...user });
      return user;
    },

    upsertUser(user) {
      tables.sequences.users = Math.max(tables.sequences.users, user.id);
      tables.users.set(user.id, { ...user });
    },

    insertBook(draft) {
      tables.sequences.books += 1;
      const book: Book = { id: tables.sequences.books, ...draft };
      tables.books.set(book.id, { ...book });
      return book;
    },

    upsertBook(book) {
      tables.sequences.books = Math.max(tables.sequences.books, book.id);
      tables.books.set(book.id, { ...book });
    },

    deleteBook(id) {
      return tables.books.delete(id);
    },

    insertRecord(draft) {
      tables.sequences.records += 1;
      const record: BorrowingRecord = { id: tables.sequences.records, ...draft };
      tables.records.set(record.id, { ...record });
      return record;
    },

    upsertRecord(record) {
      tables.sequences.records = Math.max(tables.sequences.records, record.id);
      tables.records.set(record.id, { ...record });
    },

    transaction<T>(work: () => T): T {
      if (depth > 0) {
        return work();
      }
      const snapshot = cloneTables(tables);
      depth += 1;
      try {
        return work();
      } catch (error) {
        tables = snapshot;
        throw error;
      } finally {
        depth -= 1;
      }
    },

    close() {
      tables = {
        users: new Map(),
        books: new Map(),
        records: new Map(),
        sequences: { users: 0, books: 0, records: 0 }
      };
    }
  };
};
