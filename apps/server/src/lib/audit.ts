import { auditLogEnabled } from "../config/env";

export type AuditAction =
  | "USER_REGISTERED"
  | "BOOK_CREATED"
  | "BOOK_UPDATED"
  | "BOOK_DELETED"
  | "BOOK_BORROWED"
  | "RESERVATION_COLLECTED"
  | "BOOK_RESERVED"
  | "RESERVATION_CANCELLED"
  | "BOOK_RETURNED";

type AuditInput = {
  actorUserId?: number;
  action: AuditAction;
  entity: "USER" | "BOOK" | "BORROWING_RECORD";
  entityId?: number;
  metadata?: Record<string, unknown>;
};

export const formatAuditEntry = (input: AuditInput, at: Date = new Date()): string =>
  JSON.stringify({ at: at.toISOString(), ...input });

type AuditWriterOptions = {
  enabled: boolean;
  write: (line: string) => void;
  now?: () => Date;
};

export const createAuditWriter =
  ({ enabled, write, now = () => new Date() }: AuditWriterOptions) =>
  (input: AuditInput): void => {
    if (!enabled) {
      return;
    }
    write(formatAuditEntry(input, now()));
  };

export const createAuditLog = createAuditWriter({
  enabled: auditLogEnabled,
  // eslint-disable-next-line no-console
  write: (line) => console.info(line)
});
