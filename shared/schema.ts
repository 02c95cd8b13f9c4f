import { sqliteTable, text, integer, blob, index } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================
// RECORD LIFECYCLE ENUMS
// ============================================

export const RECORD_STATUSES = [
  "Open",
  "Under Review",
  "In Action",
  "Blocked",
  "Closed",
] as const;

export type RecordStatus = (typeof RECORD_STATUSES)[number];

/** Status assigned on creation. */
export const INITIAL_STATUS: RecordStatus = "Open";
/** Status written by the close transition. */
export const CLOSED_STATUS: RecordStatus = "Closed";
/** Status written by the reopen transition. */
export const REOPENED_STATUS: RecordStatus = "In Action";

export const EVIDENCE_PHASES = ["opening", "closing", "reopening"] as const;

export type EvidencePhase = (typeof EVIDENCE_PHASES)[number];

export const SEVERITIES = ["Low", "Medium", "High", "Critical"] as const;

export type Severity = (typeof SEVERITIES)[number];

export const CATEGORIES = [
  "Safety",
  "Quality",
  "Environment",
  "Operation",
  "Maintenance",
  "Other",
] as const;

export type Category = (typeof CATEGORIES)[number];

export const EFFECTIVENESS_OPTIONS = ["To verify", "Effective", "Not effective"] as const;

export type Effectiveness = (typeof EFFECTIVENESS_OPTIONS)[number];

// ============================================
// INSPECTION RECORDS (RNC)
// ============================================
// severity/category/effectiveness stay plain text in storage; the allowed
// values are enforced by the insert and transition schemas below.

export const inspectionRecords = sqliteTable("inspection_records", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  date: text("date"), // YYYY-MM-DD
  area: text("area"),
  title: text("title"),
  inspector: text("inspector"),
  description: text("description"),
  severity: text("severity"),
  category: text("category"),
  immediateActions: text("immediate_actions"),
  correctiveActionOwner: text("corrective_action_owner"),

  status: text("status", { enum: RECORD_STATUSES }).notNull().default("Open"),

  // Closure (written together by close)
  closedAt: text("closed_at"), // ISO-8601
  closedBy: text("closed_by"),
  closingNotes: text("closing_notes"),
  effectiveness: text("effectiveness"),

  // Reopening (written together by reopen)
  reopenedAt: text("reopened_at"), // ISO-8601
  reopenedBy: text("reopened_by"),
  reopeningReason: text("reopening_reason"),
}, (table) => ({
  statusIdx: index("inspection_records_status_idx").on(table.status),
}));

export type InspectionRecord = typeof inspectionRecords.$inferSelect;

/** Fields a caller may supply on creation; lifecycle columns are owned by the repository. */
export type NewInspectionRecord = Omit<
  typeof inspectionRecords.$inferInsert,
  | "id"
  | "status"
  | "closedAt"
  | "closedBy"
  | "closingNotes"
  | "effectiveness"
  | "reopenedAt"
  | "reopenedBy"
  | "reopeningReason"
>;

// ============================================
// EVIDENCE (photos stored as BLOBs)
// ============================================

export const evidence = sqliteTable("evidence", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  recordId: integer("record_id")
    .notNull()
    .references(() => inspectionRecords.id, { onDelete: "cascade" }),
  payload: blob("payload", { mode: "buffer" }).notNull(),
  filename: text("filename"),
  mimeType: text("mime_type"),
  phase: text("phase", { enum: EVIDENCE_PHASES }).notNull().default("opening"),
}, (table) => ({
  recordPhaseIdx: index("evidence_record_phase_idx").on(table.recordId, table.phase),
}));

export type Evidence = typeof evidence.$inferSelect;

/** One photo as handed over by the shell, before it is tied to a record. */
export interface EvidenceUpload {
  payload: Buffer;
  filename: string | null;
  mimeType: string | null;
}

// ============================================
// INPUT SCHEMAS
// ============================================

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Trimmed free text; blank input is stored as NULL. */
const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null));

export const insertInspectionRecordSchema = createInsertSchema(inspectionRecords)
  .omit({
    id: true,
    status: true,
    closedAt: true,
    closedBy: true,
    closingNotes: true,
    effectiveness: true,
    reopenedAt: true,
    reopenedBy: true,
    reopeningReason: true,
  })
  .extend({
    date: z
      .string()
      .regex(ISO_DATE, "Expected a date formatted as YYYY-MM-DD")
      .nullish()
      .transform((value) => value ?? null),
    title: z.string().trim().min(1, "Title is required"),
    area: optionalText,
    inspector: optionalText,
    description: optionalText,
    severity: z.enum(SEVERITIES),
    category: z.enum(CATEGORIES),
    immediateActions: optionalText,
    correctiveActionOwner: optionalText,
  });

export const closeRecordSchema = z.object({
  closedBy: z.string().trim().min(1, "closedBy is required"),
  notes: z.string().trim().default(""),
  effectiveness: z.enum(EFFECTIVENESS_OPTIONS).default("To verify"),
});

export type CloseRecordInput = z.infer<typeof closeRecordSchema>;

export const reopenRecordSchema = z.object({
  reopenedBy: z.string().trim().min(1, "reopenedBy is required"),
  reason: z.string().trim().min(1, "reason is required"),
});

export type ReopenRecordInput = z.infer<typeof reopenRecordSchema>;

/**
 * Record query filter. An absent or empty dimension places no restriction.
 */
export interface RecordFilter {
  statuses?: RecordStatus[];
  severities?: string[];
  /** Case-insensitive substring of `area`. */
  area?: string;
  /** Case-insensitive substring of `inspector`. */
  inspector?: string;
}
