import fs from "fs";
import path from "path";
import initSqlJs, { type Database, type ParamsObject } from "sql.js";
import { z } from "zod";
import {
  recordStatuses,
  userRoles,
  type Book,
  type BorrowingRecord,
  type NewBook,
  type NewBorrowingRecord,
  type NewUser,
  type User
} from "../types/library";
import type { LibraryStore } from "./store";

// AUTOINCREMENT: ids of deleted rows are never reissued.
const schema = [
  `CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('student', 'librarian')),
    token TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS books (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    author TEXT NOT NULL,
    isbn TEXT NOT NULL UNIQUE,
    publication_year INTEGER,
    total_copies INTEGER NOT NULL CHECK (total_copies >= 0),
    available_copies INTEGER NOT NULL CHECK (available_copies >= 0 AND available_copies <= total_copies)
  )`,
  `CREATE TABLE IF NOT EXISTS borrowing_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    student_id INTEGER NOT NULL,
    book_id INTEGER NOT NULL,
    borrow_date TEXT,
    due_date TEXT,
    return_date TEXT,
    closed_at TEXT,
    status TEXT NOT NULL CHECK (status IN ('reserved', 'borrowed', 'returned', 'cancelled'))
  )`,
  "CREATE INDEX IF NOT EXISTS idx_records_student ON borrowing_records(student_id, status)",
  "CREATE INDEX IF NOT EXISTS idx_records_book ON borrowing_records(book_id, status)"
];

const userRowSchema = z
  .object({
    id: z.number().int().min(1),
    username: z.string(),
    password_hash: z.string(),
    role: z.enum(userRoles),
    token: z.string().nullable()
  })
  .transform(
    (row): User => ({
      id: row.id,
      username: row.username,
      passwordHash: row.password_hash,
      role: row.role,
      token: row.token || null
    })
  );

const bookRowSchema = z
  .object({
    id: z.number().int().min(1),
    title: z.string(),
    author: z.string(),
    isbn: z.string(),
    publication_year: z.number().int().nullable(),
    total_copies: z.number().int().min(0),
    available_copies: z.number().int().min(0)
  })
  .transform(
    (row): Book => ({
      id: row.id,
      title: row.title,
      author: row.author,
      isbn: row.isbn,
      publicationYear: row.publication_year,
      totalCopies: row.total_copies,
      availableCopies: row.available_copies
    })
  );

const recordRowSchema = z
  .object({
    id: z.number().int().min(1),
    student_id: z.number().int(),
    book_id: z.number().int(),
    borrow_date: z.string().nullable(),
    due_date: z.string().nullable(),
    return_date: z.string().nullable(),
    closed_at: z.string().nullable(),
    status: z.enum(recordStatuses)
  })
  .transform(
    (row): BorrowingRecord => ({
      id: row.id,
      studentId: row.student_id,
      bookId: row.book_id,
      borrowDate: row.borrow_date,
      dueDate: row.due_date,
      returnDate: row.return_date,
      closedAt: row.closed_at,
      status: row.status
    })
  );

const insertedIdSchema = z.object({ id: z.number().int().min(1) });

const userParams = (user: NewUser): ParamsObject => ({
  "@username": user.username,
  "@passwordHash": user.passwordHash,
  "@role": user.role,
  "@token": user.token
});

const bookParams = (book: NewBook): ParamsObject => ({
  "@title": book.title,
  "@author": book.author,
  "@isbn": book.isbn,
  "@publicationYear": book.publicationYear,
  "@totalCopies": book.totalCopies,
  "@availableCopies": book.availableCopies
});

const recordParams = (record: NewBorrowingRecord): ParamsObject => ({
  "@studentId": record.studentId,
  "@bookId": record.bookId,
  "@borrowDate": record.borrowDate,
  "@dueDate": record.dueDate,
  "@returnDate": record.returnDate,
  "@closedAt": record.closedAt,
  "@status": record.status
});

const withId = (id: number, params: ParamsObject): ParamsObject => ({ ...params, "@id": id });

const sql = {
  insertUser: "INSERT INTO users (username, password_hash, role, token) VALUES (@username, @passwordHash, @role, @token)",
  upsertUser: `INSERT INTO users (id, username, password_hash, role, token)
    VALUES (@id, @username, @passwordHash, @role, @token)
    ON CONFLICT(id) DO UPDATE SET
      username = excluded.username,
      password_hash = excluded.password_hash,
      role = excluded.role,
      token = excluded.token`,
  insertBook: `INSERT INTO books (title, author, isbn, publication_year, total_copies, available_copies)
    VALUES (@title, @author, @isbn, @publicationYear, @totalCopies, @availableCopies)`,
  upsertBook: `INSERT INTO books (id, title, author, isbn, publication_year, total_copies, available_copies)
    VALUES (@id, @title, @author, @isbn, @publicationYear, @totalCopies, @availableCopies)
    ON CONFLICT(id) DO UPDATE SET
      title = excluded.title,
      author = excluded.author,
      isbn = excluded.isbn,
      publication_year = excluded.publication_year,
      total_copies = excluded.total_copies,
      available_copies = excluded.available_copies`,
  insertRecord: `INSERT INTO borrowing_records (student_id, book_id, borrow_date, due_date, return_date, closed_at, status)
    VALUES (@studentId, @bookId, @borrowDate, @dueDate, @returnDate, @closedAt, @status)`,
  upsertRecord: `INSERT INTO borrowing_records (id, student_id, book_id, borrow_date, due_date, return_date, closed_at, status)
    VALUES (@id, @studentId, @bookId, @borrowDate, @dueDate, @returnDate, @closedAt, @status)
    ON CONFLICT(id) DO UPDATE SET
      student_id = excluded.student_id,
      book_id = excluded.book_id,
      borrow_date = excluded.borrow_date,
      due_date = excluded.due_date,
      return_date = excluded.return_date,
      closed_at = excluded.closed_at,
      status = excluded.status`
};

// Statements are prepared per call: Database.export() frees every open statement.
const queryRows = (db: Database, statementSql: string, params: ParamsObject = {}): ParamsObject[] => {
  const statement = db.prepare(statementSql);
  try {
    statement.bind(params);
    const rows: ParamsObject[] = [];
    while (statement.step()) {
      rows.push(statement.getAsObject());
    }
    return rows;
  } finally {
    statement.free();
  }
};

const openDatabase = async (filename: string): Promise<Database> => {
  const SQL = await initSqlJs();
  if (filename === ":memory:") {
    return new SQL.Database();
  }
  fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  return new SQL.Database(fs.existsSync(filename) ? fs.readFileSync(filename) : null);
};

/**
 * Durable store backed by SQLite compiled to WebAssembly. The database lives in memory and the
 * whole file is rewritten after every committed transaction (skipped for `:memory:`).
 */
export const createSqliteStore = async (filename: string): Promise<LibraryStore> => {
  const db = await openDatabase(filename);
  let depth = 0;

  const persist = (): void => {
    if (filename === ":memory:") {
      return;
    }
    const staging = `${filename}.tmp`;
    fs.writeFileSync(staging, db.export());
    fs.renameSync(staging, filename);
  };

  const transaction = <T>(work: () => T): T => {
    if (depth > 0) {
      return work();
    }
    db.exec("BEGIN");
    depth += 1;
    let committed = false;
    try {
      const result = work();
      db.exec("COMMIT");
      committed = true;
      persist();
      return result;
    } catch (error) {
      if (!committed) {
        db.exec("ROLLBACK");
      }
      throw error;
    } finally {
      depth -= 1;
    }
  };

  const lastInsertId = (): number =>
    insertedIdSchema.parse(queryRows(db, "SELECT last_insert_rowid() AS id")[0]).id;

  const findOne = <T>(rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>, statementSql: string, params: ParamsObject) => {
    const [row] = queryRows(db, statementSql, params);
    return row === undefined ? null : rowSchema.parse(row);
  };

  for (const statement of schema) {
    db.run(statement);
  }
  persist();

  return {
    listUsers: () => queryRows(db, "SELECT * FROM users ORDER BY id").map((row) => userRowSchema.parse(row)),
    listBooks: () => queryRows(db, "SELECT * FROM books ORDER BY id").map((row) => bookRowSchema.parse(row)),
    listRecords: () =>
      queryRows(db, "SELECT * FROM borrowing_records ORDER BY id").map((row) => recordRowSchema.parse(row)),
    findUser: (id) => findOne(userRowSchema, "SELECT * FROM users WHERE id = @id", { "@id": id }),
    findUserByUsername: (username) =>
      findOne(userRowSchema, "SELECT * FROM users WHERE username = @username", { "@username": username }),
    findBook: (id) => findOne(bookRowSchema, "SELECT * FROM books WHERE id = @id", { "@id": id }),
    findRecord: (id) => findOne(recordRowSchema, "SELECT * FROM borrowing_records WHERE id = @id", { "@id": id }),

    insertUser: (draft) =>
      transaction(() => {
        db.run(sql.insertUser, userParams(draft));
        return { id: lastInsertId(), ...draft };
      }),

    upsertUser: (user) =>
      transaction(() => {
        db.run(sql.upsertUser, withId(user.id, userParams(user)));
      }),

    insertBook: (draft) =>
      transaction(() => {
        db.run(sql.insertBook, bookParams(draft));
        return { id: lastInsertId(), ...draft };
      }),

    upsertBook: (book) =>
      transaction(() => {
        db.run(sql.upsertBook, withId(book.id, bookParams(book)));
      }),

    deleteBook: (id) =>
      transaction(() => {
        db.run("DELETE FROM books WHERE id = @id", { "@id": id });
        return db.getRowsModified() > 0;
      }),

    insertRecord: (draft) =>
      transaction(() => {
        db.run(sql.insertRecord, recordParams(draft));
        return { id: lastInsertId(), ...draft };
      }),

    upsertRecord: (record) =>
      transaction(() => {
        db.run(sql.upsertRecord, withId(record.id, recordParams(record)));
      }),

    transaction,

    close() {
      db.close();
    }
  };
};
