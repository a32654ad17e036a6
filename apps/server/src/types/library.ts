export const userRoles = ["student", "librarian"] as const;
export type Role = (typeof userRoles)[number];

export const recordStatuses = ["reserved", "borrowed", "returned", "cancelled"] as const;
export type RecordStatus = (typeof recordStatuses)[number];

export const activeStatuses: readonly RecordStatus[] = ["reserved", "borrowed"];

export type User = {
  id: number;
  username: string;
  passwordHash: string;
  role: Role;
  token: string | null;
};

export type Book = {
  id: number;
  title: string;
  author: string;
  isbn: string;
  publicationYear: number | null;
  totalCopies: number;
  availableCopies: number;
};

export type BorrowingRecord = {
  id: number;
  studentId: number;
  bookId: number;
  borrowDate: string | null;
  dueDate: string | null;
  returnDate: string | null;
  closedAt: string | null;
  status: RecordStatus;
};

export type Identity = {
  id: number;
  role: Role;
  username: string;
};

export type NewUser = Omit<User, "id">;
export type NewBook = Omit<Book, "id">;
export type NewBorrowingRecord = Omit<BorrowingRecord, "id">;

export const isActiveRecord = (record: BorrowingRecord): boolean => activeStatuses.includes(record.status);
