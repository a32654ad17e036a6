import type { Book, BorrowingRecord, User } from "../types/library";
import type { ActiveRecordWithBook, ActiveRecordWithDetails } from "./borrowing";

// Wire shapes keep the snake_case field names existing clients read.

export const serializeBook = (book: Book) => ({
  id: book.id,
  title: book.title,
  author: book.author,
  isbn: book.isbn,
  publication_year: book.publicationYear,
  available_copies: book.availableCopies,
  total_copies: book.totalCopies
});

export const serializeRecord = (record: BorrowingRecord) => ({
  id: record.id,
  student_id: record.studentId,
  book_id: record.bookId,
  borrow_date: record.borrowDate ?? "",
  due_date: record.dueDate ?? "",
  return_date: record.returnDate ?? "",
  closed_at: record.closedAt ?? "",
  status: record.status
});

export const serializeStudent = (user: User) => ({
  id: user.id,
  username: user.username,
  role: user.role
});

export const serializeActiveRecord = ({ record, book }: ActiveRecordWithBook) => ({
  ...serializeRecord(record),
  book_details: serializeBook(book)
});

export const serializeActiveRecordWithStudent = ({ record, book, student }: ActiveRecordWithDetails) => ({
  ...serializeActiveRecord({ record, book }),
  student_details: serializeStudent(student)
});
